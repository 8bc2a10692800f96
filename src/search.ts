import type { AppContext } from "./context.js";
import type { SearchResponse } from "./types.js";

export const DEFAULT_TOP_K = 5;

export async function searchCode(
  ctx: AppContext,
  query: string,
  userId: string,
  topK: number = DEFAULT_TOP_K,
  repoId?: string
): Promise<SearchResponse> {
  const store = await ctx.stores.get(userId);
  return store.search(query, topK, repoId);
}

/** Row count of a user's table, for status reporting. */
export async function countChunks(ctx: AppContext, userId: string): Promise<number> {
  const store = await ctx.stores.get(userId);
  return store.count();
}

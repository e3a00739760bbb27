export { TokenStoreClient } from "./client.js";
export type { TokenStoreOptions } from "./client.js";
export { insertEmbedToken, findEmbedToken } from "./operations.js";
export type { EmbedToken, NewEmbedToken } from "./operations.js";
export { CREATE_EMBED_TOKENS_TABLE } from "./schema.js";

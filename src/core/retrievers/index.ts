export * from './types.js';
export { GitRetriever, type GitRetrieverOptions } from './git-retriever.js';
export { ArchiveRetriever, type ArchiveRetrieverOptions } from './archive-retriever.js';
export { PathRetriever } from './path-retriever.js';

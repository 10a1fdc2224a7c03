export type { EmbeddingBackend } from './backend';
export { LocalHashingBackend, fnv1a, tokenize } from './local';
export { RemoteEmbeddingBackend, createRemoteEmbeddingBackend, type EmbeddingsClient } from './remote';
export {
  EmbeddingProvider,
  createEmbeddingProvider,
  type EmbeddingProviderOptions,
  type InputType,
} from './provider';

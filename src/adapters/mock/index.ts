export { InMemoryStorageAdapter } from './InMemoryStorageAdapter';

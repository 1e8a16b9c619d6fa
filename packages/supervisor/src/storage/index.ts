export { FileStateStore, KeyedStateStore, keyToFileName, type StateCodec } from './file-state-store.js';

export { JsonFileCollection, type JsonFileCollectionOptions } from './JsonFileCollection.js';
export { InMemoryCollection } from './InMemoryCollection.js';
export {
  STORE_FILES,
  createJsonFileStores,
  createInMemoryStores,
  loadSeed,
  type JsonFileStoresOptions,
} from './clinical-stores.js';

export { loadDataFile, dataFilePath, deepFreeze } from './data-loader.js';

export { ScanService, type ScanServiceDeps, type ScanList } from './ScanService.js';

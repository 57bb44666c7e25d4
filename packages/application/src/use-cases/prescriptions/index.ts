export {
  PrescriptionService,
  type PrescriptionServiceDeps,
  type PrescriptionList,
  type Uploader,
} from './PrescriptionService.js';

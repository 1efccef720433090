export {
  ViewerTransportError,
  ViewerTransportErrorCode,
} from './viewer-transport-error.js';
export { MissingHostIntegrationError } from './missing-host-integration-error.js';

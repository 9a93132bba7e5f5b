export { encodeForm, FORM_CONTENT_TYPE } from './form-encoder.js';
export type { FormFields } from './form-encoder.js';
export {
  encodeMultipart,
  createMultipartBoundary,
  isFormFile,
} from './multipart-encoder.js';
export type {
  FormFile,
  MultipartValue,
  MultipartFields,
  EncodedMultipart,
} from './multipart-encoder.js';

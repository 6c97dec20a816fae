export type { FileApi } from './fileApi';
export { NodeFileApi } from './fileApiImpl';
export { fileApi, setFileApi, resetFileApi } from './fileApiProvider';

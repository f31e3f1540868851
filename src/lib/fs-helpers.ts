export {
  decodeUtf8,
  readTextFile,
  type ReadTextFileOptions,
} from './fs-helpers/read-text-file.js';

export {
  ArrayLineSource,
  BufferedLineSink,
  type LineSink,
  type LineSource,
  StreamLineSink,
} from './line-io.js';
export { parseInteger, TokenReader, tokenize } from './token-reader.js';

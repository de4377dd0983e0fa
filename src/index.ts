export { Md5 } from './md5/Md5.js';
export { init, update, finalize, hash } from './md5/engine.js';
export type { EngineState, OpenEngineState, FinalizedEngineState, FinalizeResult } from './md5/engine.js';
export { compressBlock } from './md5/compress.js';
export type { DigestState } from './md5/compress.js';
export { md5Padding } from './md5/padding.js';
export { BLOCK_SIZE, DIGEST_SIZE, INITIAL_STATE } from './md5/constants.js';
export { toHex } from './hex.js';
export { UsageError } from './errors.js';
export type { UsageErrorCode } from './errors.js';
export { createMd5Transform } from './streams/digestTransform.js';
export type { Md5TransformResult } from './streams/digestTransform.js';
export type { DigestProgressEvent, DigestProgressOptions, Md5ReadOptions } from './types.js';

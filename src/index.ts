export { CvidDecoder } from './cvid-decoder';
export {
  CVID_WIDTH,
  CVID_HEIGHT,
  CVID_PIXELS,
  CVID_MAX_ENTRIES,
  CVID_MAX_STRIPS,
  DECODE_SUCCESS,
  DECODE_ERROR_EOF,
  DECODE_ERROR_INVALID_DATA,
  DECODE_ERROR_BAD_DIMENSIONS,
  DECODE_ERROR_INTERNAL,
  DEFAULT_DECODER_OPTIONS,
  CvidDecodeError,
  getStatusName,
  getChunkTagName,
} from './cvid-types';
export type {
  DecodeStatus,
  CvidDecoderOptions,
  CvidFrame,
  CvidFrameInfo,
  CvidFileStats,
} from './cvid-types';
export { yuvToBgr555, bgr555ToRgb, bgr555FramebufferToRgba } from './color-utils';
export type { RGB } from './color-utils';

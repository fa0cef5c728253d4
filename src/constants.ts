/**
 * The format tag for standard pulse-code modulation (PCM) audio.
 * @type {0x0001}
 * @constant
 */
export const WAVE_FORMAT_PCM: 0x0001 = 0x0001;

/**
 * The format tag for IEEE 754 floating-point audio data.
 * @type {0x0003}
 * @constant
 */
export const WAVE_FORMAT_IEEE_FLOAT: 0x0003 = 0x0003;

/**
 * The four-character code (FourCC) that opens every RIFF container.
 * @constant
 */
export const RIFF_ID = 'RIFF';

/**
 * The RIFF form type identifying a WAVE audio file.
 * @constant
 */
export const WAVE_ID = 'WAVE';

/**
 * The FourCC of the chunk describing how samples are encoded.
 * @constant
 */
export const FMT_CHUNK = 'fmt ';

/**
 * The FourCC of the chunk holding the raw interleaved sample frames.
 * @constant
 */
export const DATA_CHUNK = 'data';

/** Size of the container header: tag, size field and form type. */
export const RIFF_HEADER_SIZE = 12;

/** Size of a chunk header: tag and payload size. */
export const CHUNK_HEADER_SIZE = 8;

/** Minimum payload of a `"fmt "` chunk. */
export const FORMAT_PAYLOAD_SIZE = 16;

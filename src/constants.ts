/**
 * binrec — layout constants
 *
 * These constants define the binary contract of the container file.
 * Any change to the magic bytes or the reserved metadata keys is a
 * BREAKING CHANGE: files written before the change become unreadable.
 *
 * A container file is laid out as:
 *
 *   ── Header (written once by ContainerWriter.open) ────────────────────────
 *   [0..3]    magic         'O' 'b' 'j' 0x01
 *   [4..]     metadata map  {count varint, (key: string, value: bytes)*}, 0-terminated
 *                           always carries "schema" and "codec"
 *   [..+16]   sync marker   16 random bytes
 *
 *   ── Blocks (repeated until end of input) ────────────────────────────────
 *   record_count    zig-zag varint
 *   byte_length     zig-zag varint — length of the compressed payload
 *   payload         byte_length bytes, compressed with the header codec
 *   sync marker     the same 16 bytes as the header
 */

// ─── Magic ────────────────────────────────────────────────────────────────────

/** First four bytes of every container file. Checked before anything else is read. */
export const CONTAINER_MAGIC: Readonly<Uint8Array> = new Uint8Array([0x4f, 0x62, 0x6a, 0x01]);

// ─── Sync Marker ──────────────────────────────────────────────────────────────

export const SYNC_MARKER_SIZE = 16; // bytes

// ─── Metadata Keys ────────────────────────────────────────────────────────────

/** Metadata key holding the writer schema as UTF-8 JSON text. */
export const META_SCHEMA = 'schema';

/** Metadata key holding the compression codec name. Absent means 'null'. */
export const META_CODEC  = 'codec';

/** Keys owned by the container format. User metadata may not use them. */
export const RESERVED_META_KEYS: ReadonlySet<string> = new Set([META_SCHEMA, META_CODEC]);

// ─── Writer Defaults ──────────────────────────────────────────────────────────

export const DEFAULT_CODEC = 'null';

/**
 * Raw (uncompressed) bytes buffered before a block is flushed.
 * A block is flushed once it reaches this size, so a single record larger
 * than the threshold still ends up alone in its own block.
 */
export const DEFAULT_BLOCK_SIZE = 16_000;

/** Record-count threshold. Unlimited unless the caller sets blockRecords. */
export const DEFAULT_BLOCK_RECORDS = Number.POSITIVE_INFINITY;

// ─── Reader ───────────────────────────────────────────────────────────────────

/**
 * Most array items of a zero-width type (null, an empty record, fixed of
 * size 0) one decode may produce. Such items cost no input bytes, so the
 * block counts alone cannot bound them.
 */
export const MAX_EMPTY_ITEMS = 1 << 20;

/** Bytes requested from a ByteSource per read call while filling the reader buffer. */
export const SOURCE_READ_CHUNK = 64 * 1024;

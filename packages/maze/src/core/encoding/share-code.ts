/**
 * Maze Share Codes
 *
 * Compact, URL-safe encoding of a whole maze so it can be passed between
 * collaborators (a link, a clipboard, a test fixture) and rebuilt exactly.
 *
 * Byte layout, then base64url without padding:
 *
 * | bytes | content                                        |
 * | ----- | ---------------------------------------------- |
 * | 1     | format version                                 |
 * | 2     | width, uint16 little-endian                    |
 * | 2     | height, uint16 little-endian                   |
 * | n     | one bit per interior edge, 1 = wall, LSB-first |
 * | 4     | CRC32 of everything before it, little-endian   |
 *
 * Edges are enumerated by {@link forEachInteriorEdge}.
 *
 * @example
 * ```typescript
 * const walls = generate(8, 8, 42);
 * const code = encodeMaze(8, 8, walls);
 * const copy = decodeMaze(code);  // { width: 8, height: 8, walls }
 * ```
 */

import {
  bitPack,
  bitUnpack,
  crc32,
  DimensionSchema,
  Err,
  fromBase64Url,
  MazeError,
  Ok,
  type Result,
  ShareCodeSchema,
  toBase64Url,
} from "@labyrinth/contracts";
import { assertDimensions } from "../geometry/cell";
import { forEachInteriorEdge, interiorEdgeCount } from "../grid/edges";
import { type ReadonlyWallSet, WallSet } from "../walls/wall-set";

const SHARE_CODE_VERSION = 1;
const HEADER_BYTES = 5;
const CRC_BYTES = 4;

export interface DecodedMaze {
  readonly width: number;
  readonly height: number;
  readonly walls: WallSet;
}

/**
 * Encode a maze into a share code.
 *
 * @throws {MazeError} INVALID_DIMENSIONS for unsupported sizes
 * @throws {MazeError} INVALID_WALL_SET when a wall lies outside the grid
 */
export function encodeMaze(
  width: number,
  height: number,
  walls: ReadonlyWallSet,
): string {
  assertDimensions(width, height);

  const flags: boolean[] = [];
  let encodedWalls = 0;
  forEachInteriorEdge(width, height, (key) => {
    const present = walls.hasKey(key);
    if (present) encodedWalls++;
    flags.push(present);
  });

  if (encodedWalls !== walls.size) {
    throw new MazeError(
      "INVALID_WALL_SET",
      `${walls.size - encodedWalls} wall(s) lie outside the ${width}x${height} grid`,
      { width, height, wallCount: walls.size },
    );
  }

  const packed = bitPack(flags);
  const bytes = new Uint8Array(HEADER_BYTES + packed.length + CRC_BYTES);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, SHARE_CODE_VERSION);
  view.setUint16(1, width, true);
  view.setUint16(3, height, true);
  bytes.set(packed, HEADER_BYTES);

  const body = bytes.subarray(0, HEADER_BYTES + packed.length);
  view.setUint32(HEADER_BYTES + packed.length, crc32(body), true);

  return toBase64Url(bytes);
}

/**
 * Decode a share code produced by {@link encodeMaze}.
 *
 * @throws {MazeError} INVALID_SHARE_CODE when the code is malformed, of an
 * unknown version, truncated or fails its CRC
 */
export function decodeMaze(code: string): DecodedMaze {
  const text = ShareCodeSchema.safeParse(code);
  if (!text.success) {
    throw MazeError.fromZodError("INVALID_SHARE_CODE", text.error);
  }

  let bytes: Uint8Array;
  try {
    bytes = fromBase64Url(text.data);
  } catch (error) {
    throw MazeError.invalidShareCode("Share code is not valid base64url", {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (bytes.length < HEADER_BYTES + CRC_BYTES) {
    throw MazeError.invalidShareCode("Share code is too short", {
      length: bytes.length,
    });
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const version = view.getUint8(0);
  if (version !== SHARE_CODE_VERSION) {
    throw MazeError.invalidShareCode(
      `Unsupported share code version: ${version}`,
      { version },
    );
  }

  const width = view.getUint16(1, true);
  const height = view.getUint16(3, true);
  if (
    !DimensionSchema.safeParse(width).success ||
    !DimensionSchema.safeParse(height).success
  ) {
    throw MazeError.invalidShareCode(
      `Share code has unsupported dimensions ${width}x${height}`,
      { width, height },
    );
  }

  const edgeCount = interiorEdgeCount(width, height);
  const packedLength = Math.ceil(edgeCount / 8);
  const expectedLength = HEADER_BYTES + packedLength + CRC_BYTES;
  if (bytes.length !== expectedLength) {
    throw MazeError.invalidShareCode(
      `Share code length ${bytes.length} does not match a ${width}x${height} maze (${expectedLength} bytes)`,
      { width, height, length: bytes.length, expectedLength },
    );
  }

  const body = bytes.subarray(0, HEADER_BYTES + packedLength);
  const storedCrc = view.getUint32(HEADER_BYTES + packedLength, true);
  if (crc32(body) !== storedCrc) {
    throw MazeError.invalidShareCode("Share code failed its CRC check", {
      storedCrc,
    });
  }

  const flags = bitUnpack(bytes.subarray(HEADER_BYTES), edgeCount);
  const walls = new WallSet();
  let index = 0;
  forEachInteriorEdge(width, height, (_key, a, b) => {
    if (flags[index]) walls.add(a, b);
    index++;
  });

  return { width, height, walls };
}

/**
 * {@link decodeMaze} returning a Result instead of throwing.
 */
export function tryDecodeMaze(code: string): Result<DecodedMaze, MazeError> {
  try {
    return Ok(decodeMaze(code));
  } catch (error) {
    if (MazeError.isMazeError(error)) return Err(error);
    throw error;
  }
}

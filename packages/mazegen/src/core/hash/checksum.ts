/**
 * FNV-1a 32-bit fingerprint of a grid's link set.
 *
 * Two grids with the same dimensions and the same passages produce the
 * same checksum, which is what determinism checks compare.
 */

import type { Grid } from "../grid/grid";

const FNV32_OFFSET_BASIS = 0x811c9dc5;
const FNV32_PRIME = 0x01000193;

export class FNV32Hasher {
  private hash = FNV32_OFFSET_BASIS;

  updateByte(byte: number): this {
    this.hash ^= byte & 0xff;
    this.hash = Math.imul(this.hash, FNV32_PRIME) >>> 0;
    return this;
  }

  /**
   * Add a 32-bit integer (little-endian).
   */
  updateInt32(value: number): this {
    const v = value >>> 0;
    this.updateByte(v & 0xff);
    this.updateByte((v >>> 8) & 0xff);
    this.updateByte((v >>> 16) & 0xff);
    this.updateByte((v >>> 24) & 0xff);
    return this;
  }

  digest(): number {
    return this.hash >>> 0;
  }

  digestHex(): string {
    return this.digest().toString(16).padStart(8, "0");
  }
}

export function linkChecksum(grid: Grid): string {
  const hasher = new FNV32Hasher().updateInt32(grid.rows).updateInt32(grid.columns);
  for (const [a, b] of grid.links()) {
    hasher.updateInt32(a.index).updateInt32(b.index);
  }
  return hasher.digestHex();
}

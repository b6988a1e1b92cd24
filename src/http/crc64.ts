/**
 * CRC-64 with the ISO 3309 polynomial (x^64 + x^4 + x^3 + x + 1), bit-reflected,
 * initial value and final xor of all ones. Check value of "123456789" is 0xb90956c775a41001.
 */

const POLY_REFLECTED = 0xd800000000000000n;
const MASK = 0xffffffffffffffffn;

function buildTable(): bigint[] {
  const table: bigint[] = [];
  for (let i = 0; i < 256; i++) {
    let crc = BigInt(i);
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 1n ? (crc >> 1n) ^ POLY_REFLECTED : crc >> 1n;
    }
    table.push(crc);
  }
  return table;
}

const TABLE = buildTable();

export function crc64Iso(data: Uint8Array): bigint {
  let crc = MASK;
  for (const byte of data) {
    crc = TABLE[Number((crc ^ BigInt(byte)) & 0xffn)] ^ (crc >> 8n);
  }
  return crc ^ MASK;
}

// CRC-24Q as used by RTCM 3 (polynomial 0x1864CFB, initial value 0)

const CRC24Q_POLY = 0x1864cfb;

const CRC24Q_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i << 16;
    for (let bit = 0; bit < 8; bit++) {
      crc <<= 1;
      if (crc & 0x1000000) crc ^= CRC24Q_POLY;
    }
    table[i] = crc & 0xffffff;
  }
  return table;
})();

export function crc24q(data: Uint8Array, start = 0, end = data.length): number {
  let crc = 0;
  for (let i = start; i < end; i++) {
    crc = ((crc << 8) & 0xffffff) ^ CRC24Q_TABLE[((crc >>> 16) ^ data[i]) & 0xff];
  }
  return crc;
}

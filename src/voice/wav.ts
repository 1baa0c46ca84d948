/**
 * Sample data of a RIFF/WAVE file: the payload of its `data` chunk.
 */
export function pcmFromWav(wav: Buffer): Buffer {
  if (wav.length < 12 || wav.toString('ascii', 0, 4) !== 'RIFF' || wav.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Not a WAVE file');
  }
  let offset = 12;
  while (offset + 8 <= wav.length) {
    const id = wav.toString('ascii', offset, offset + 4);
    const size = wav.readUInt32LE(offset + 4);
    const start = offset + 8;
    if (id === 'data') {
      return wav.subarray(start, Math.min(start + size, wav.length));
    }
    // chunks are padded to an even size
    offset = start + size + (size % 2);
  }
  throw new Error('WAVE file has no data chunk');
}

/** Little-endian 16-bit samples to the big-endian order of audio/l16. */
export function toBigEndian16(pcm: Buffer): Buffer {
  const even = pcm.length - (pcm.length % 2);
  return Buffer.from(pcm.subarray(0, even)).swap16();
}

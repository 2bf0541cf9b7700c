import { EncodingError } from './errors.js'

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

/**
 * Offset of the first byte that does not start a well-formed UTF-8 sequence,
 * or -1 when the whole buffer is valid.
 */
export function findInvalidUtf8(bytes: Uint8Array): number {
  let i = 0
  while (i < bytes.length) {
    const lead = bytes[i]
    if (lead < 0x80) {
      i += 1
      continue
    }

    let trailing: number
    let min = 0x80
    let max = 0xbf
    if (lead >= 0xc2 && lead <= 0xdf) {
      trailing = 1
    } else if (lead >= 0xe0 && lead <= 0xef) {
      trailing = 2
      if (lead === 0xe0) min = 0xa0
      // U+D800..U+DFFF are not encodable
      if (lead === 0xed) max = 0x9f
    } else if (lead >= 0xf0 && lead <= 0xf4) {
      trailing = 3
      if (lead === 0xf0) min = 0x90
      if (lead === 0xf4) max = 0x8f
    } else {
      return i
    }

    if (i + trailing >= bytes.length) return i
    const second = bytes[i + 1]
    if (second < min || second > max) return i
    for (let k = 2; k <= trailing; k++) {
      if ((bytes[i + k] & 0xc0) !== 0x80) return i
    }
    i += trailing + 1
  }
  return -1
}

/** Decode UTF-8 bytes, keeping a leading BOM so offsets stay faithful to the input. */
export function decodeUtf8(bytes: Uint8Array): string {
  const invalidAt = findInvalidUtf8(bytes)
  if (invalidAt !== -1) {
    throw new EncodingError(invalidAt)
  }
  return decoder.decode(bytes)
}

export function toSourceText(input: string | Uint8Array): string {
  return typeof input === 'string' ? input : decodeUtf8(input)
}

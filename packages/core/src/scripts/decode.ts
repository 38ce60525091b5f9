/**
 * @module scripts/decode
 * Converts raw script bytes to text.
 *
 * Byte-order marks take precedence over the configured encoding, so a script
 * saved as UTF-16 by an editor still decodes correctly when the run is
 * configured for UTF-8. The BOM itself never appears in the decoded text.
 */

/**
 * Text encodings a script may be read with. Binary-to-text encodings such as
 * `base64` and `hex` are excluded.
 */
export type ScriptEncoding = Exclude<BufferEncoding, 'base64' | 'base64url' | 'hex'>;

const UTF8_BOM = [0xef, 0xbb, 0xbf];
const UTF16LE_BOM = [0xff, 0xfe];
const UTF16BE_BOM = [0xfe, 0xff];
const UTF32LE_BOM = [0xff, 0xfe, 0x00, 0x00];
const UTF32BE_BOM = [0x00, 0x00, 0xfe, 0xff];

const REPLACEMENT_CHARACTER = '\ufffd';

/**
 * Decodes script file contents.
 *
 * @param bytes - Raw file contents
 * @param encoding - Encoding to use when the file carries no BOM
 */
export function DecodeScriptContent(bytes: Buffer, encoding: ScriptEncoding): string {
  if (startsWith(bytes, UTF8_BOM)) {
    return bytes.subarray(UTF8_BOM.length).toString('utf-8');
  }
  // UTF-32LE shares its first two bytes with UTF-16LE, so it is checked first
  if (startsWith(bytes, UTF32LE_BOM)) {
    return decodeUtf32(bytes.subarray(UTF32LE_BOM.length), true);
  }
  if (startsWith(bytes, UTF32BE_BOM)) {
    return decodeUtf32(bytes.subarray(UTF32BE_BOM.length), false);
  }
  if (startsWith(bytes, UTF16LE_BOM)) {
    return bytes.subarray(UTF16LE_BOM.length).toString('utf16le');
  }
  if (startsWith(bytes, UTF16BE_BOM)) {
    return new TextDecoder('utf-16be').decode(bytes.subarray(UTF16BE_BOM.length));
  }

  return bytes.toString(encoding);
}

/**
 * Whether `name` is an encoding scripts can be read with.
 */
export function IsScriptEncoding(name: string): name is ScriptEncoding {
  return Buffer.isEncoding(name) && !['base64', 'base64url', 'hex'].includes(name.toLowerCase());
}

/**
 * Neither Buffer nor TextDecoder reads UTF-32. Invalid code points and a
 * trailing partial unit become U+FFFD.
 */
function decodeUtf32(bytes: Buffer, littleEndian: boolean): string {
  let text = '';
  let offset = 0;
  for (; offset + 4 <= bytes.length; offset += 4) {
    const codePoint = littleEndian ? bytes.readUInt32LE(offset) : bytes.readUInt32BE(offset);
    const isSurrogate = codePoint >= 0xd800 && codePoint <= 0xdfff;
    text += codePoint > 0x10ffff || isSurrogate ? REPLACEMENT_CHARACTER : String.fromCodePoint(codePoint);
  }
  if (offset < bytes.length) {
    text += REPLACEMENT_CHARACTER;
  }
  return text;
}

function startsWith(bytes: Buffer, prefix: number[]): boolean {
  return bytes.length >= prefix.length && prefix.every((b, i) => bytes[i] === b);
}

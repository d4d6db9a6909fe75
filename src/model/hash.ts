/**
 * 32-bit string hash (h = 31 * h + charCode), as used by findByHashCode().
 *
 * Names from different packages can collide; full paths rarely do.
 */
export function hashName(value: string): number {
  let hash = 0
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0
  }
  return hash
}

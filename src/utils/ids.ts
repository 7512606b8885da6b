import { customAlphabet } from 'nanoid/non-secure'

const generateSuffix = customAlphabet('0123456789abcdef', 8)

// Opaque handle for values a host maps back to its own objects.
export function newId(prefix: string): string {
  return `${prefix}_${generateSuffix()}`
}

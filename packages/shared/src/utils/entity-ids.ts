/**
 * ID generation utilities
 *
 * Format: <prefix>_<hex>
 * - Command sessions: cmd_a1b2c3d4e5f6a7b8c9d0e1f2a3b4c5d6
 */

/**
 * Generate a cryptographically secure random ID with prefix.
 */
function generateRandomId(prefix: string, byteLength: number): string {
  const bytes = new Uint8Array(byteLength);
  globalThis.crypto.getRandomValues(bytes);
  const randomHex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
  return `${prefix}_${randomHex}`;
}

/**
 * Generate a unique command session ID
 */
export function generateSessionId(): string {
  return generateRandomId("cmd", 16);
}

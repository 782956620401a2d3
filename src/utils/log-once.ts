/**
 * At-most-once logging per key
 *
 * NEVER use console.log() - stdout is the MCP JSON-RPC stream.
 *
 * @module utils/log-once
 */

export class OneShotLog {
  private readonly seen = new Set<string>();

  /**
   * Write `message` to stderr the first time `key` is seen.
   * @returns true when the message was written
   */
  warn(key: string, message: string): boolean {
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    console.error(message);
    return true;
  }

  has(key: string): boolean {
    return this.seen.has(key);
  }

  reset(): void {
    this.seen.clear();
  }
}

import * as crypto from "crypto";

/**
 * Hands out UUIDs for KiCad items.
 *
 * A UUID is derived from the project namespace and a key naming the item
 * (e.g. `SW3` or `SW3_pin_1`), so regenerating the same layout gives every
 * item the same UUID again.
 */
export class UuidManager {
  private uuids = new Map<string, string>();
  private readonly namespace: string;

  constructor(namespace: string) {
    this.namespace = namespace;
  }

  /**
   * Get the UUID for an item, deriving it on first use.
   * @param key Unique identifier for the item within the project
   */
  getOrGenerate(key: string): string {
    let uuid = this.uuids.get(key);
    if (!uuid) {
      uuid = UuidManager.derive(this.namespace, key);
      this.uuids.set(key, uuid);
    }
    return uuid;
  }

  /** Number of distinct items a UUID was handed out for. */
  get size(): number {
    return this.uuids.size;
  }

  /** Name-based UUID in the RFC 4122 version 5 layout. */
  static derive(namespace: string, key: string): string {
    const hash = crypto.createHash("sha1").update(namespace).update("\0").update(key).digest();
    hash[6] = (hash[6] & 0x0f) | 0x50;
    hash[8] = (hash[8] & 0x3f) | 0x80;
    const hex = hash.subarray(0, 16).toString("hex");
    return [
      hex.slice(0, 8),
      hex.slice(8, 12),
      hex.slice(12, 16),
      hex.slice(16, 20),
      hex.slice(20, 32),
    ].join("-");
  }
}

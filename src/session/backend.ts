/**
 * Session storage boundary
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface SessionBackend {
  /** Value of `key` in session `id`; undefined when absent or expired */
  get(id: string, key: string): Promise<JsonValue | undefined>;

  set(id: string, key: string, value: JsonValue): Promise<void>;

  /** Remove `key` after `seconds`; 0 removes it now */
  expire(id: string, key: string, seconds: number): Promise<void>;

  remove(id: string, key: string): Promise<void>;

  /** Delete expired entries; resolves with how many were removed */
  collectGarbage(): Promise<number>;
}

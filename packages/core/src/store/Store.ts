/**
 * Keyed binary storage backing the session jar.
 *
 * `get` resolves `null` when the key is absent and an empty array when the
 * key holds an empty value. Backend failures reject.
 */
export interface Store {
  put(key: string, value: Uint8Array): Promise<void>;
  get(key: string): Promise<Uint8Array | null>;
}

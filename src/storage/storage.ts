/**
 * Key-value persistence port.
 *
 * Values are plain JSON; callers validate what they load.
 */
export interface Storage {
  /**
   * @returns the stored value, or null when the key was never saved
   */
  load(key: string): Promise<unknown>;

  save(key: string, data: unknown): Promise<void>;

  /**
   * @returns false if the key did not exist
   */
  delete(key: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;
}

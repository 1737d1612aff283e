/**
 * A version-controlled content store that tracks large files by URL reference.
 *
 * Implementations are bound to one dataset directory. Destination paths are
 * `/`-separated and relative to that directory.
 */
export interface DatasetBackend {
  /** Creates the dataset if needed; a no-op on an existing one. */
  init(): Promise<void>;
  /** Makes later content fetches present `Authorization: Bearer <token>`. */
  configureAuth(token: string): Promise<void>;
  /** Records a pointer to `url` under `destinationPath` without downloading it. */
  registerRemote(url: string, destinationPath: string): Promise<void>;
  materialize(destinationPath: string): Promise<void>;
  isMaterialized(destinationPath: string): Promise<boolean>;
  commit(message: string): Promise<void>;
}

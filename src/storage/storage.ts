/** FileStorage abstracts the save directory that holds notes and uploads. */
export interface FileStorage {
  /** Create the backing location if it does not exist yet. */
  init(): Promise<void>;
  /** Stored bytes, or null when there is no regular file of that name. */
  read(name: string): Promise<Buffer | null>;
  /** Overwrite (or create) the file. */
  write(name: string, data: Buffer): Promise<void>;
  /** Create the file only if the name is free; false when it is taken. */
  create(name: string, data: Buffer): Promise<boolean>;
  /** Remove the file. Missing files are ignored. */
  remove(name: string): Promise<void>;
  exists(name: string): Promise<boolean>;
  /** Number of regular files currently stored. */
  count(): Promise<number>;
}

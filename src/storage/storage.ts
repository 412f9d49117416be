/** Text file access used by the snapshot codec. */
export interface DataStorage {
  /** Returns null when the file does not exist. */
  readText(path: string): Promise<string | null>;
  /** Replaces the file in one step, creating parent directories. */
  writeText(path: string, content: string): Promise<void>;
}

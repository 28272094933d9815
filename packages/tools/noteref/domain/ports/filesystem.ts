// Filesystem port - the file operations the note collection and ledger need

export type DirEntry = {
  readonly name: string;
  readonly isFile: boolean;
  readonly isDirectory: boolean;
};

export interface FileSystem {
  /** UTF-8 text of a file; rejects with `io_error` when it is missing. */
  readFile(path: string): Promise<string>;

  /** Replace a file's content in one write, creating parent directories. */
  writeFile(path: string, content: string): Promise<void>;

  exists(path: string): Promise<boolean>;

  /** Direct children of a directory; nothing when it does not exist. */
  readDir(path: string): AsyncIterable<DirEntry>;
}

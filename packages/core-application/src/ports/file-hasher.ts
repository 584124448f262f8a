export type FileHash = {
  algorithm: "md5";
  value: string;
};

export interface FileHasher {
  hashFile(absolutePath: string): Promise<FileHash>;
}

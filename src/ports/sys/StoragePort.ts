export interface StoragePort {
  write(key: string, value: Buffer | string): Promise<string>;
}

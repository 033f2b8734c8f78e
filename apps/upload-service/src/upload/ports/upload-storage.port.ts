import { Readable } from 'stream';

export const UPLOAD_STORAGE = Symbol('UPLOAD_STORAGE');

export interface UploadStorage {
  /**
   * Persist a named stream
   * @returns Opaque identifier of the stored file
   */
  store(name: string, content: Readable): Promise<string>;
}

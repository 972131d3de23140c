import { fileTypeFromBuffer } from 'file-type';

import type { ContentSniffer } from '../collaborators.js';

/**
 * Magic-number detection backed by the `file-type` package.
 */
export class FileTypeSniffer implements ContentSniffer {
  async detectExtension(bytes: Uint8Array): Promise<string | undefined> {
    const detected = await fileTypeFromBuffer(bytes);
    return detected?.ext;
  }
}

import fs from 'node:fs';
import type { DecodedImage } from '@shared/contracts';

export interface ImageDecoder {
  decode(filePath: string): Promise<DecodedImage>;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const HEADER_BYTES = 64 * 1024;

/**
 * Identifies PNG, JPEG and GIF files and reads their pixel size from the
 * header. Pixels are never decoded.
 */
export class ImageHeaderDecoder implements ImageDecoder {
  async decode(filePath: string): Promise<DecodedImage> {
    const handle = await fs.promises.open(filePath, 'r');
    let header: Buffer;
    try {
      const buffer = Buffer.alloc(HEADER_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, HEADER_BYTES, 0);
      header = buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }

    if (header.length === 0) {
      throw new Error('image file is empty');
    }

    const decoded = readPng(header) ?? readGif(header) ?? readJpeg(header);
    if (!decoded) {
      throw new Error('unsupported or corrupt image format');
    }

    return { filePath, ...decoded };
  }
}

type ImageHeader = Omit<DecodedImage, 'filePath'>;

function readPng(header: Buffer): ImageHeader | null {
  if (header.length < 24 || !header.subarray(0, 8).equals(PNG_SIGNATURE)) {
    return null;
  }

  return {
    format: 'png',
    width: header.readUInt32BE(16),
    height: header.readUInt32BE(20)
  };
}

function readGif(header: Buffer): ImageHeader | null {
  const magic = header.subarray(0, 6).toString('ascii');
  if (header.length < 10 || (magic !== 'GIF87a' && magic !== 'GIF89a')) {
    return null;
  }

  return {
    format: 'gif',
    width: header.readUInt16LE(6),
    height: header.readUInt16LE(8)
  };
}

// Walks JPEG segments until a start-of-frame marker, which carries the size.
function readJpeg(header: Buffer): ImageHeader | null {
  if (header.length < 4 || header[0] !== 0xff || header[1] !== 0xd8) {
    return null;
  }

  let offset = 2;
  while (offset + 1 < header.length) {
    if (header[offset] !== 0xff) {
      return null;
    }

    // any number of 0xff fill bytes may precede a marker
    while (header[offset + 1] === 0xff) {
      offset += 1;
    }

    const marker = header[offset + 1];
    if (marker === undefined) {
      return null;
    }

    if (isStandaloneMarker(marker)) {
      offset += 2;
      continue;
    }

    if (offset + 4 > header.length) {
      return null;
    }

    if (isStartOfFrame(marker)) {
      if (offset + 9 > header.length) {
        return null;
      }
      return {
        format: 'jpeg',
        height: header.readUInt16BE(offset + 5),
        width: header.readUInt16BE(offset + 7)
      };
    }

    offset += 2 + header.readUInt16BE(offset + 2);
  }

  return null;
}

// TEM and RST0-RST7 carry no length field.
function isStandaloneMarker(marker: number): boolean {
  return marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7);
}

function isStartOfFrame(marker: number): boolean {
  return marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fs from 'node:fs/promises';
import * as path from 'path';
import { AllConfigType } from '../../../config/config.type';
import {
  EncodedImage,
  ImageSourcePort,
} from '../../domain/ports/image-source.port';
import {
  encodeImageBuffer,
  isSupportedImage,
  mimeTypeFor,
} from './image-encoding.util';

/**
 * Reads card images from a local directory.
 */
@Injectable()
export class LocalImageSourceAdapter implements ImageSourcePort {
  private readonly logger = new Logger(LocalImageSourceAdapter.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  async listImages(): Promise<string[]> {
    const imageDir = this.configService.getOrThrow('cardExtraction.imageDir', {
      infer: true,
    });

    let entries: string[];
    try {
      entries = await fs.readdir(imageDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        await fs.mkdir(imageDir, { recursive: true });
        this.logger.log(`[IMAGES] Created image directory ${imageDir}`);
        return [];
      }
      throw error;
    }

    const images = entries.filter(isSupportedImage).sort();
    this.logger.log(`[IMAGES] Found ${images.length} image(s) in ${imageDir}`);
    return images.map((name) => path.join(imageDir, name));
  }

  async readImage(filePath: string): Promise<EncodedImage> {
    const filename = path.basename(filePath);
    const buffer = await fs.readFile(filePath);
    return encodeImageBuffer(
      buffer,
      filename,
      mimeTypeFor(filename) ?? 'image/jpeg',
    );
  }
}

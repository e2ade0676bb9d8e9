import sharp from 'sharp';
import type { AttachmentRef } from './bot/types';
import type { MediaConfig } from './config';
import type { Logger } from './logger';

/**
 * Attachment download or decode failure. The turn answers with a fixed reply; the message is for the logs.
 */
export class MediaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MediaError';
  }
}

export class MediaHandler {
  private maxFileSizeBytes: number;

  constructor(
    private config: MediaConfig,
    private logger: Logger,
  ) {
    this.maxFileSizeBytes = config.maxFileSizeMb * 1024 * 1024;
  }

  /**
   * Download a file from a URL with size guard and timeout.
   */
  async downloadFile(fileUrl: string, fileSize?: number): Promise<Buffer> {
    // Pre-check size if known
    if (fileSize && fileSize > this.maxFileSizeBytes) {
      throw this.tooLarge(fileSize);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.downloadTimeoutMs);

    try {
      const response = await fetch(fileUrl, { signal: controller.signal });
      if (!response.ok) {
        throw new MediaError(`Failed to download file (HTTP ${response.status}).`);
      }

      const buffer = Buffer.from(await response.arrayBuffer());

      // Post-check actual size
      if (buffer.length > this.maxFileSizeBytes) {
        throw this.tooLarge(buffer.length);
      }

      return buffer;
    } catch (error) {
      if (error instanceof MediaError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new MediaError('File download timed out.', { cause: error });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new MediaError(`Failed to download file: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Download an image attachment and re-encode it as a base64 JPEG for vision models.
   */
  async processImage(attachment: AttachmentRef): Promise<string> {
    this.logger.debug(
      { url: attachment.url, name: attachment.name, contentType: attachment.contentType },
      'Processing image attachment',
    );

    if (attachment.contentType && !attachment.contentType.startsWith('image/')) {
      throw new MediaError(`Unsupported attachment type: ${attachment.contentType}`);
    }

    const buffer = await this.downloadFile(attachment.url, attachment.size);

    let jpeg: Buffer;
    try {
      jpeg = await sharp(buffer).flatten({ background: '#ffffff' }).jpeg({ quality: 90 }).toBuffer();
    } catch (error) {
      throw new MediaError('Attachment is not a readable image.', { cause: error });
    }

    this.logger.debug({ bytes: buffer.length, jpegBytes: jpeg.length }, 'Image converted to JPEG');
    return jpeg.toString('base64');
  }

  private tooLarge(bytes: number): MediaError {
    return new MediaError(
      `File is too large (${(bytes / 1024 / 1024).toFixed(1)} MB). Maximum allowed size is ${this.config.maxFileSizeMb} MB.`,
    );
  }
}

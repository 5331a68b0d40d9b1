import { Jimp } from 'jimp';
import { z } from 'zod';
import { createLogger } from '../log.js';
import { describeError } from '../redmine/errors.js';
import type { Attachment } from '../redmine/schemas.js';
import { formatSize, refName } from './format.js';
import { ToolInputError, defineTool, type ToolModule } from './types.js';

export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;
export const IMAGE_TYPES = ['image/png', 'image/jpeg', 'image/gif', 'image/webp'];
export const DEFAULT_MAX_IMAGE_SIDE = 800;
const JPEG_QUALITY = 85;
// Jimp ships no WebP codec; these go out as stored.
const UNDECODED_TYPES = ['image/webp'];

const log = createLogger('attachments');

/** Strips parameters such as "; charset=binary". */
function mediaType(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

export function formatAttachment(attachment: Attachment): string {
  const lines = [
    `Attachment #${attachment.id}: ${attachment.filename}`,
    '',
    `Size: ${formatSize(attachment.filesize)}`,
    `Type: ${attachment.content_type || 'unknown'}`,
    `Description: ${attachment.description || '(none)'}`,
    `Uploaded by: ${refName(attachment.author, 'unknown')}`,
    `Uploaded: ${attachment.created_on ?? 'unknown'}`,
    `Download URL: ${attachment.content_url ?? 'n/a'}`,
  ];
  if (IMAGE_TYPES.includes(mediaType(attachment.content_type))) {
    lines.push('', `This is an image; call get_attachment_image with attachment_id ${attachment.id} to view it.`);
  }
  return lines.join('\n');
}

// ─── Image Preparation ──────────────────────────────────────────────────────

export interface PreparedImage {
  data: Buffer;
  width: number;
  height: number;
  originalWidth: number;
  originalHeight: number;
}

/**
 * Flattens transparency onto white and re-encodes as JPEG. When `maxSide` is given, an image
 * wider or taller than it is scaled down to fit, keeping its aspect ratio; smaller images keep
 * their size.
 */
export async function prepareImage(content: Buffer, maxSide?: number): Promise<PreparedImage> {
  const image = await Jimp.read(content);
  const originalWidth = image.bitmap.width;
  const originalHeight = image.bitmap.height;
  if (maxSide !== undefined && (originalWidth > maxSide || originalHeight > maxSide)) {
    image.scaleToFit({ w: maxSide, h: maxSide });
  }

  const flat = new Jimp({ width: image.bitmap.width, height: image.bitmap.height, color: 0xffffffff });
  flat.composite(image, 0, 0);
  return {
    data: await flat.getBuffer('image/jpeg', { quality: JPEG_QUALITY }),
    width: flat.bitmap.width,
    height: flat.bitmap.height,
    originalWidth,
    originalHeight,
  };
}

// ─── Tools ──────────────────────────────────────────────────────────────────

export const attachmentTools: ToolModule = {
  domain: 'attachments',
  tools: [
    defineTool({
      name: 'get_attachment_info',
      label: 'Fetching attachment',
      description: 'Get the metadata of an attachment without downloading it',
      inputSchema: {
        attachment_id: z.number().int().positive(),
      },
      readOnly: true,
      execute: async ({ attachment_id }, { client }) => formatAttachment(await client.getAttachment(attachment_id)),
    }),
    defineTool({
      name: 'get_attachment_image',
      label: 'Downloading image',
      description:
        'Download an image attachment (PNG, JPEG, GIF or WebP, up to 10 MB) so it can be looked at. ' +
        'Returned as JPEG, scaled down to max_size pixels on the longer side unless thumbnail is false',
      inputSchema: {
        attachment_id: z.number().int().positive(),
        thumbnail: z.boolean().default(true).describe('Scale images larger than max_size down to fit'),
        max_size: z.number().int().positive().default(DEFAULT_MAX_IMAGE_SIDE).describe('Longest side in pixels when thumbnail is on'),
      },
      readOnly: true,
      execute: async ({ attachment_id, thumbnail, max_size }, { client }) => {
        const attachment = await client.getAttachment(attachment_id);
        const type = mediaType(attachment.content_type);
        if (!IMAGE_TYPES.includes(type)) {
          throw new ToolInputError(
            `Attachment #${attachment_id} (${attachment.filename}) is not a supported image.\n` +
            `Type: ${attachment.content_type || 'unknown'}\nSupported: ${IMAGE_TYPES.join(', ')}`,
          );
        }
        if (attachment.filesize > MAX_IMAGE_BYTES) {
          throw new ToolInputError(
            `Attachment #${attachment_id} (${attachment.filename}) is too large: ${formatSize(attachment.filesize)} (limit ${formatSize(MAX_IMAGE_BYTES)}).`,
          );
        }

        const { content } = await client.downloadAttachment(attachment_id);
        if (content.length > MAX_IMAGE_BYTES) {
          throw new ToolInputError(
            `Attachment #${attachment_id} (${attachment.filename}) is too large: ${formatSize(content.length)} (limit ${formatSize(MAX_IMAGE_BYTES)}).`,
          );
        }
        if (UNDECODED_TYPES.includes(type)) {
          return {
            type: 'image',
            data: content.toString('base64'),
            mimeType: type,
            caption: `Attachment #${attachment_id}: ${attachment.filename} (${formatSize(content.length)})`,
          };
        }

        let image: PreparedImage;
        try {
          image = await prepareImage(content, thumbnail ? max_size : undefined);
        } catch (err) {
          throw new ToolInputError(`Attachment #${attachment_id} (${attachment.filename}) could not be read as an image: ${describeError(err)}`);
        }

        const original = `${image.originalWidth}x${image.originalHeight}`;
        const resized = image.width !== image.originalWidth || image.height !== image.originalHeight;
        if (resized) {
          log.info(
            `#${attachment_id} (${attachment.filename}): ${original} -> ${image.width}x${image.height}, ` +
            `${formatSize(content.length)} -> ${formatSize(image.data.length)}`,
          );
        }
        return {
          type: 'image',
          data: image.data.toString('base64'),
          mimeType: 'image/jpeg',
          caption: `Attachment #${attachment_id}: ${attachment.filename} (${resized ? `${original}, shown at ${image.width}x${image.height}` : original})`,
        };
      },
    }),
  ],
};

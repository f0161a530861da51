import z from 'zod/v3';

import { defineTool } from '@app/mcp-server/tool-registry.js';
import type { ToolRegistry } from '@app/mcp-server/tool-registry.js';
import { presignedDownloadShape, presignedUploadShape } from '@app/schemas.js';
import type { UploadService } from '@app/services/upload-service.js';

export function defineUploadTools(registry: ToolRegistry, uploads: UploadService): void {
  registry.register(defineTool({
    name: 'get_presigned_url',
    group: 'upload',
    title: 'Get presigned upload URL',
    description: 'Get a URL to PUT a file to directly, valid for 15 minutes. Store the returned key as the invoice originalDownloadLink.',
    inputSchema: {
      filename: z.string().describe('Original file name; its extension is kept'),
      contentType: z.string().optional().describe('MIME type, defaults to application/octet-stream'),
    },
    outputSchema: presignedUploadShape,
    invoke: function (input) {
      return uploads.getPresignedUploadUrl(input);
    },
  }));

  registry.register(defineTool({
    name: 'get_download_url',
    group: 'upload',
    title: 'Get download URL',
    description: 'Get a download URL for a stored file key, valid for one hour.',
    inputSchema: {
      key: z.string().describe('Object key returned by an upload'),
    },
    outputSchema: presignedDownloadShape,
    invoke: function (input) {
      return uploads.getPresignedDownloadUrl(input.key);
    },
  }));
}

/**
 * Output image extraction for `executed` events and /history entries.
 */

import type { OutputImage } from './types.ts';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First saved image of one node's output.
 *
 * Accepts the engine's `{images: [{filename, subfolder, type}]}` shape and
 * the flat `{filename}` shape some custom save nodes report.
 */
export function pickOutputImage(nodeOutput: unknown): OutputImage | null {
  if (!isRecord(nodeOutput)) return null;

  if (Array.isArray(nodeOutput.images)) {
    for (const image of nodeOutput.images) {
      if (!isRecord(image) || typeof image.filename !== 'string') continue;
      const type = typeof image.type === 'string' ? image.type : 'output';
      if (type !== 'output') continue;
      return {
        filename: image.filename,
        subfolder: typeof image.subfolder === 'string' ? image.subfolder : '',
        type,
      };
    }
  }

  if (typeof nodeOutput.filename === 'string' && nodeOutput.filename) {
    return {
      filename: nodeOutput.filename,
      subfolder: typeof nodeOutput.subfolder === 'string' ? nodeOutput.subfolder : '',
      type: typeof nodeOutput.type === 'string' ? nodeOutput.type : 'output',
    };
  }

  return null;
}

/**
 * Output image from a /history `outputs` map, trying `preferredNodeId`
 * before every other node.
 */
export function extractOutputImage(outputs: unknown, preferredNodeId: string): OutputImage | null {
  if (!isRecord(outputs)) return null;

  if (Object.hasOwn(outputs, preferredNodeId)) {
    const preferred = pickOutputImage(outputs[preferredNodeId]);
    if (preferred) return preferred;
  }

  for (const [nodeId, nodeOutput] of Object.entries(outputs)) {
    if (nodeId === preferredNodeId) continue;
    const image = pickOutputImage(nodeOutput);
    if (image) return image;
  }

  return null;
}

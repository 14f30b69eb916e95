/**
 * Test Fixtures Utilities
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { WorkflowGraph } from '../../src/services/workflow/types.ts';

const FIXTURES_ROOT = fileURLToPath(new URL('../fixtures/', import.meta.url));

/**
 * Get the absolute path to a fixture file.
 */
export function fixturePath(relativePath: string): string {
  return `${FIXTURES_ROOT}${relativePath}`;
}

/**
 * Fresh copy of the sample workflow graph.
 *
 * Nodes: 6 (text), 9 (SaveImage), 10 (LoadImage), 12-14 (value),
 * 20 (text_negative + style_name), 30 and 4 (no text field), 59 (prompt).
 */
export function sampleWorkflow(): WorkflowGraph {
  return JSON.parse(readFileSync(fixturePath('workflow_api.json'), 'utf-8'));
}

/**
 * Sample node mapping matching sampleWorkflow().
 */
export function sampleMapping() {
  return {
    roles: { save_image_node: '9', ollama_node: '59', load_image_node: '10' },
    variants: {
      text_to_image: {
        description_node: '12',
        visual_cue_node: '13',
        mood_cue_node: '14',
      },
    },
  };
}

/**
 * Placeholder Listing
 *
 * Shown when the host has no code under the cursor, so there is always
 * something to play against.
 */

import type { DisplayLine } from '../engine/types';

export const PLACEHOLDER_LINES: readonly DisplayLine[] = [
  { lineNumber: 1, text: 'mov eax, ebx' },
  { lineNumber: 2, text: 'cmp eax, 0' },
  { lineNumber: 3, text: 'jne loc_next' },
  { lineNumber: 4, text: 'call sub_handler' },
  { lineNumber: 5, text: 'ret' },
];

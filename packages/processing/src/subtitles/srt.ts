/**
 * SubRip rendering
 */

import { formatTimecode } from '@cutline/utils';
import type { SubtitleTrack } from '../types.js';

/**
 * Render cues as a SubRip document, numbered from 1
 */
export function formatSrt(track: SubtitleTrack): string {
  return track
    .map((cue, i) =>
      `${i + 1}\n${formatTimecode(cue.start, ',')} --> ${formatTimecode(cue.end, ',')}\n${cue.text}\n`
    )
    .join('\n');
}

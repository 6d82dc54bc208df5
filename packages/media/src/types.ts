/**
 * Media Types
 */

/**
 * A probed input video. Immutable once created.
 */
export interface VideoSource {
  readonly path: string;
  /** Seconds */
  readonly duration: number;
  /** Container format name as reported by ffprobe, e.g. `mov,mp4,m4a,3gp,3g2,mj2` */
  readonly container: string;
  readonly width: number | null;
  readonly height: number | null;
  /** Frames per second, null when the container does not say */
  readonly frameRate: number | null;
  readonly hasAudio: boolean;
}

export interface ResolvedDuration {
  duration: number;
  adjusted: boolean;
}

/**
 * Rounds a requested clip length up to the nearest duration the video model accepts,
 * capping at the largest one. An empty accepted set means any duration is taken as is.
 */
export function resolveVideoDuration(requested: number, accepted: readonly number[]): ResolvedDuration {
  if (accepted.length === 0) {
    return { duration: requested, adjusted: false };
  }
  const sorted = [ ...accepted ].sort((a, b) => a - b);
  const duration = sorted.find(value => value >= requested) ?? sorted[ sorted.length - 1 ];
  return { duration, adjusted: duration !== requested };
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export const formatTime = (seconds: number) => {
  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
};

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

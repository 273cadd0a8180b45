import { CrossfadeClip } from "../types/index.js";
import { AssemblyError } from "./errors.js";
import { roundTo } from "./utils.js";



export interface CrossfadeOptions {
    width: number;
    height: number;
    fps?: number;
    sampleRate?: number;
}

export interface CrossfadePlan {
    filterGraph: string[];
    videoLabel: string;
    audioLabel: string;
    offsets: number[];
    expectedDurationSeconds: number;
}

/**
 * Start offsets of each transition on the output timeline. Transition i begins one
 * transition length before the end of clip i, where the timeline has already been
 * shortened by the i transitions before it.
 */
export function computeCrossfadeOffsets(durations: readonly number[], transitionSeconds: number): number[] {
    const offsets: number[] = [];
    let cumulative = 0;
    for (let i = 0; i < durations.length - 1; i++) {
        cumulative += durations[ i ];
        offsets.push(roundTo(cumulative - (i + 1) * transitionSeconds, 6));
    }
    return offsets;
}

export function expectedCrossfadeDuration(durations: readonly number[], transitionSeconds: number): number {
    if (durations.length === 0) return 0;
    const total = durations.reduce((sum, d) => sum + d, 0);
    return roundTo(total - (durations.length - 1) * transitionSeconds, 6);
}

/**
 * Builds an ffmpeg filter_complex that normalises every input to one size, frame rate
 * and audio layout. Each clip after the first fades in over its alpha channel and is
 * overlaid onto a black canvas at its transition offset, so the video side needs no
 * filter newer than ffmpeg 4.1. Audio is padded to the clip length and joined with
 * `acrossfade` over the same windows. Clips without sound get a silent track.
 */
export function buildCrossfadePlan(clips: readonly CrossfadeClip[], transitionSeconds: number, options: CrossfadeOptions): CrossfadePlan {
    if (clips.length < 2) {
        throw new AssemblyError(`Crossfade needs at least two clips, got ${clips.length}`);
    }
    const tooShort = clips.filter(clip => clip.durationSeconds <= transitionSeconds);
    if (tooShort.length > 0) {
        throw new AssemblyError("Clip shorter than the transition", {
            clips: tooShort.map(clip => clip.path),
            transitionSeconds,
        });
    }

    const { width, height, fps = 30, sampleRate = 44100 } = options;
    const durations = clips.map(clip => clip.durationSeconds);
    const offsets = computeCrossfadeOffsets(durations, transitionSeconds);
    const expectedDurationSeconds = expectedCrossfadeDuration(durations, transitionSeconds);
    const t = transitionSeconds.toFixed(3);
    const normalise = `scale=${width}:${height}:force_original_aspect_ratio=decrease,pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=${fps}`;
    const graph: string[] = [
        `color=c=black:s=${width}x${height}:r=${fps}:d=${expectedDurationSeconds.toFixed(3)},format=yuv420p[base]`,
    ];

    clips.forEach((clip, i) => {
        graph.push(i === 0
            ? `[0:v]${normalise},format=yuv420p,setpts=PTS-STARTPTS[v0]`
            : `[${i}:v]${normalise},format=yuva420p,fade=t=in:st=0:d=${t}:alpha=1,setpts=PTS-STARTPTS+${offsets[ i - 1 ].toFixed(3)}/TB[v${i}]`);
        const length = clip.durationSeconds.toFixed(3);
        graph.push(clip.hasAudio
            ? `[${i}:a]aformat=sample_rates=${sampleRate}:channel_layouts=stereo,apad,atrim=0:${length},asetpts=PTS-STARTPTS[a${i}]`
            : `anullsrc=channel_layout=stereo:sample_rate=${sampleRate},atrim=0:${length}[a${i}]`);
    });

    let videoLabel = "base";
    clips.forEach((_clip, i) => {
        graph.push(`[${videoLabel}][v${i}]overlay=eof_action=pass[vx${i}]`);
        videoLabel = `vx${i}`;
    });

    let audioLabel = "a0";
    offsets.forEach((_offset, index) => {
        const next = index + 1;
        graph.push(`[${audioLabel}][a${next}]acrossfade=d=${t}[ax${next}]`);
        audioLabel = `ax${next}`;
    });

    return {
        filterGraph: graph,
        videoLabel,
        audioLabel,
        offsets,
        expectedDurationSeconds,
    };
}

//shared/types/media.types.ts

export interface MediaProbe {
    durationSeconds: number;
    width: number;
    height: number;
    hasAudio: boolean;
}

export interface CrossfadeClip {
    path: string;
    /** Measured, not requested, length of the clip. */
    durationSeconds: number;
    hasAudio: boolean;
}

/**
 * Local-file media operations backed by an external transcoding tool.
 * Every method resolves with the path it wrote.
 */
export interface MediaTranscoder {
    probe(filePath: string): Promise<MediaProbe>;
    extractLastFrame(videoPath: string, outputPath: string): Promise<string>;
    merge(videoPath: string, audioPath: string, outputPath: string): Promise<string>;
    concatCrossfade(clips: CrossfadeClip[], transitionSeconds: number, outputPath: string): Promise<string>;
    concatLossless(clipPaths: string[], outputPath: string): Promise<string>;
}

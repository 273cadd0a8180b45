import ffmpeg from "fluent-ffmpeg";
import fs from "fs";
import path from "path";
import ffmpegBin from "@ffmpeg-installer/ffmpeg";
import ffprobeBin from "@ffprobe-installer/ffprobe";
import { CrossfadeClip, MediaProbe, MediaTranscoder } from "../types/index.js";
import { buildCrossfadePlan } from "../utils/crossfade.js";
import { AssemblyError, extractErrorMessage } from "../utils/errors.js";
import { logger } from "../logger.js";
ffmpeg.setFfmpegPath(ffmpegBin.path);
ffmpeg.setFfprobePath(ffprobeBin.path);



export interface MediaControllerOptions {
    width: number;
    height: number;
    /** How far before the end of a clip its continuity frame is taken. */
    lastFrameOffsetSeconds: number;
}

/**
 * fluent-ffmpeg implementation of the media transcoder. Each call spawns one
 * ffmpeg or ffprobe process, so none of them block the event loop.
 */
export class MediaController implements MediaTranscoder {

    constructor(private options: MediaControllerOptions) { }

    probe(filePath: string): Promise<MediaProbe> {
        return new Promise((resolve, reject) => {
            ffmpeg.ffprobe(filePath, (err, metadata) => {
                if (err) {
                    reject(new AssemblyError(`Failed to probe media: ${extractErrorMessage(err)}`, { filePath }, err));
                    return;
                }
                const duration = Number(metadata.format.duration ?? 0);
                const video = metadata.streams.find(s => s.codec_type === "video");
                resolve({
                    durationSeconds: Number.isFinite(duration) ? duration : 0,
                    width: video?.width ?? 0,
                    height: video?.height ?? 0,
                    hasAudio: metadata.streams.some(s => s.codec_type === "audio"),
                });
            });
        });
    }

    async extractLastFrame(videoPath: string, outputPath: string): Promise<string> {
        const { durationSeconds } = await this.probe(videoPath);
        if (durationSeconds <= 0) {
            throw new AssemblyError(`Invalid video duration: ${durationSeconds}`, { videoPath });
        }

        const seekTime = Math.max(0, durationSeconds - this.options.lastFrameOffsetSeconds);
        const { width, height } = this.options;
        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

        await this.run("extract last frame", ffmpeg(videoPath)
            .seekInput(seekTime)
            .outputOptions([
                "-vframes", "1",
                "-vf", `scale=${width}:${height}:force_original_aspect_ratio=decrease,pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`,
                "-q:v", "2",
            ]), outputPath);

        if (!fs.existsSync(outputPath)) {
            throw new AssemblyError(`Frame extraction failed. File not found at ${outputPath}`, { videoPath });
        }
        logger.debug({ videoPath, outputPath, seekTime }, "Last frame extracted");
        return outputPath;
    }

    /**
     * Copies the video stream untouched and pads the audio with silence, so `-shortest`
     * always ends the output with the video and never with a shorter soundtrack.
     */
    async merge(videoPath: string, audioPath: string, outputPath: string): Promise<string> {
        await this.run("merge audio", ffmpeg()
            .input(videoPath)
            .input(audioPath)
            .outputOptions([
                "-map", "0:v:0",
                "-map", "1:a:0",
                "-c:v", "copy",
                "-af", "apad",
                "-c:a", "aac",
                "-shortest",
            ]), outputPath);
        return outputPath;
    }

    async concatCrossfade(clips: CrossfadeClip[], transitionSeconds: number, outputPath: string): Promise<string> {
        const plan = buildCrossfadePlan(clips, transitionSeconds, {
            width: this.options.width,
            height: this.options.height,
        });

        const command = ffmpeg();
        clips.forEach(clip => command.input(clip.path));
        command
            .complexFilter(plan.filterGraph)
            .outputOptions([
                "-map", `[${plan.videoLabel}]`,
                "-map", `[${plan.audioLabel}]`,
                "-c:v", "libx264",
                "-preset", "medium",
                "-crf", "23",
                "-c:a", "aac",
                "-b:a", "192k",
                "-movflags", "+faststart",
            ]);

        logger.info({ clips: clips.length, offsets: plan.offsets, expectedDuration: plan.expectedDurationSeconds }, "Concatenating with crossfade");
        await this.run("crossfade concat", command, outputPath);
        return outputPath;
    }

    async concatLossless(clipPaths: string[], outputPath: string): Promise<string> {
        const fileListPath = `${outputPath}.concat.txt`;
        const fileListContent = clipPaths.map(f => `file '${path.resolve(f).replace(/'/g, "'\\''")}'`).join("\n");
        await fs.promises.writeFile(fileListPath, fileListContent);

        try {
            await this.run("lossless concat", ffmpeg()
                .input(fileListPath)
                .inputOptions([ "-f", "concat", "-safe", "0" ])
                .outputOptions("-c copy"), outputPath);
            return outputPath;
        } finally {
            if (fs.existsSync(fileListPath)) fs.unlinkSync(fileListPath);
        }
    }

    private async run(step: string, command: ffmpeg.FfmpegCommand, outputPath: string): Promise<void> {
        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
        let stderr = "";

        await new Promise<void>((resolve, reject) => {
            command
                .on("start", (commandLine: string) => {
                    logger.debug({ step, commandLine }, "[ffmpeg] start");
                })
                .on("stderr", (line: string) => {
                    stderr += line + "\n";
                })
                .on("error", (err: Error) => {
                    reject(new AssemblyError(`ffmpeg failed to ${step}: ${err.message}`, { outputPath, stderr: stderr.slice(-2000) }, err));
                })
                .on("end", () => resolve())
                .save(outputPath);
        });
    }
}

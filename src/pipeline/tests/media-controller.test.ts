import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { MediaController } from '../../shared/services/media-controller.js';
import { buildCrossfadePlan } from '../../shared/utils/crossfade.js';
import { AssemblyError } from '../../shared/utils/errors.js';
import { makeTempDir } from './fakes.js';

type Handler = (arg?: Error) => void;

interface ProbeMetadata {
    format: { duration?: number; };
    streams: Array<{ codec_type: string; width?: number; height?: number; }>;
}

const ffmpegState = vi.hoisted(() => {
    class FakeCommand {
        inputs: string[] = [];
        inputOptionList: string[] = [];
        outputOptionList: string[] = [];
        filters: string[] = [];
        seek?: number;
        savedTo?: string;
        private handlers = new Map<string, Handler>();

        constructor(input?: string) {
            if (input) this.inputs.push(input);
        }

        input(source: string) { this.inputs.push(source); return this; }
        inputOptions(options: string[]) { this.inputOptionList.push(...options); return this; }
        outputOptions(options: string | string[]) {
            this.outputOptionList.push(...(Array.isArray(options) ? options : [ options ]));
            return this;
        }
        complexFilter(filters: string[]) { this.filters = filters; return this; }
        seekInput(seconds: number) { this.seek = seconds; return this; }
        on(event: string, handler: Handler) { this.handlers.set(event, handler); return this; }
        save(outputPath: string) {
            this.savedTo = outputPath;
            setImmediate(() => {
                if (state.failWith) {
                    this.handlers.get('error')?.(new Error(state.failWith));
                    return;
                }
                state.onSave(this, outputPath);
                this.handlers.get('end')?.();
            });
            return this;
        }
    }

    const factory = Object.assign(
        (input?: string) => {
            const command = new FakeCommand(input);
            state.commands.push(command);
            return command;
        },
        {
            setFfmpegPath: vi.fn(),
            setFfprobePath: vi.fn(),
            ffprobe: (_filePath: string, callback: (err: Error | null, metadata: ProbeMetadata) => void) => {
                setImmediate(() => state.probeError
                    ? callback(new Error(state.probeError), { format: {}, streams: [] })
                    : callback(null, state.metadata));
            },
        },
    );

    const state: {
        commands: FakeCommand[];
        failWith?: string;
        probeError?: string;
        metadata: ProbeMetadata;
        onSave: (command: FakeCommand, outputPath: string) => void;
        factory: typeof factory;
    } = {
        commands: [],
        metadata: { format: { duration: 5.2 }, streams: [] },
        onSave: () => { },
        factory,
    };
    return state;
});

vi.mock('fluent-ffmpeg', () => ({ default: ffmpegState.factory }));
vi.mock('@ffmpeg-installer/ffmpeg', () => ({ default: { path: '/opt/ffmpeg/ffmpeg' } }));
vi.mock('@ffprobe-installer/ffprobe', () => ({ default: { path: '/opt/ffmpeg/ffprobe' } }));

describe('MediaController', () => {
    let tempDir: string;
    let controller: MediaController;

    beforeEach(() => {
        tempDir = makeTempDir();
        ffmpegState.commands = [];
        ffmpegState.failWith = undefined;
        ffmpegState.probeError = undefined;
        ffmpegState.metadata = {
            format: { duration: 5.2 },
            streams: [ { codec_type: 'video', width: 1920, height: 1080 }, { codec_type: 'audio' } ],
        };
        ffmpegState.onSave = (_command, outputPath) => fs.writeFileSync(outputPath, '');
        controller = new MediaController({ width: 1280, height: 720, lastFrameOffsetSeconds: 0.1 });
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should point fluent-ffmpeg at the installed binaries', () => {
        expect(ffmpegState.factory.setFfmpegPath).toHaveBeenCalledWith('/opt/ffmpeg/ffmpeg');
        expect(ffmpegState.factory.setFfprobePath).toHaveBeenCalledWith('/opt/ffmpeg/ffprobe');
    });

    it('should probe duration, size and audio presence', async () => {
        await expect(controller.probe('/clips/hook.mp4')).resolves.toEqual({ durationSeconds: 5.2, width: 1920, height: 1080, hasAudio: true });
    });

    it('should report silent clips without audio', async () => {
        ffmpegState.metadata = { format: { duration: 4 }, streams: [ { codec_type: 'video', width: 640, height: 360 } ] };
        await expect(controller.probe('/clips/cta.mp4')).resolves.toMatchObject({ hasAudio: false, width: 640 });
    });

    it('should wrap probe failures as assembly errors', async () => {
        ffmpegState.probeError = 'moov atom not found';
        await expect(controller.probe('/clips/broken.mp4')).rejects.toThrow('Failed to probe media: moov atom not found');
    });

    it('should grab the frame just before the end of the clip', async () => {
        const framePath = path.join(tempDir, 'frames', 'hook_last_frame.png');

        await expect(controller.extractLastFrame('/clips/hook.mp4', framePath)).resolves.toBe(framePath);

        const [ command ] = ffmpegState.commands;
        expect(command.inputs).toEqual([ '/clips/hook.mp4' ]);
        expect(command.seek).toBeCloseTo(5.1, 6);
        expect(command.outputOptionList).toEqual([
            '-vframes', '1',
            '-vf', 'scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2',
            '-q:v', '2',
        ]);
    });

    it('should fail frame extraction when no frame was written', async () => {
        ffmpegState.onSave = () => { };
        await expect(controller.extractLastFrame('/clips/hook.mp4', path.join(tempDir, 'missing.png')))
            .rejects.toThrow('Frame extraction failed');
    });

    it('should merge audio by copying video and encoding aac', async () => {
        const outputPath = path.join(tempDir, 'hook_with_audio.mp4');
        await controller.merge('/clips/hook.mp4', '/clips/hook_audio.wav', outputPath);

        const [ command ] = ffmpegState.commands;
        expect(command.inputs).toEqual([ '/clips/hook.mp4', '/clips/hook_audio.wav' ]);
        expect(command.outputOptionList).toEqual([ '-map', '0:v:0', '-map', '1:a:0', '-c:v', 'copy', '-af', 'apad', '-c:a', 'aac', '-shortest' ]);
        expect(command.savedTo).toBe(outputPath);
    });

    it('should pad a soundtrack shorter than the clip instead of cutting the video', async () => {
        await controller.merge('/clips/solution_15s.mp4', '/clips/solution_audio_10s.wav', path.join(tempDir, 'solution_with_audio.mp4'));

        const options = ffmpegState.commands[ 0 ].outputOptionList;
        expect(options[ options.indexOf('-af') + 1 ]).toBe('apad');
        expect(options.indexOf('-af')).toBeLessThan(options.indexOf('-shortest'));
        expect(options).not.toContain('-t');
        expect(options.slice(options.indexOf('-c:v'), options.indexOf('-c:v') + 2)).toEqual([ '-c:v', 'copy' ]);
    });

    it('should crossfade with the planned filter graph', async () => {
        const clips = [
            { path: '/clips/hook.mp4', durationSeconds: 5, hasAudio: true },
            { path: '/clips/cta.mp4', durationSeconds: 5, hasAudio: false },
        ];
        await controller.concatCrossfade(clips, 0.3, path.join(tempDir, 'final_video.mp4'));

        const [ command ] = ffmpegState.commands;
        const plan = buildCrossfadePlan(clips, 0.3, { width: 1280, height: 720 });
        expect(command.inputs).toEqual([ '/clips/hook.mp4', '/clips/cta.mp4' ]);
        expect(command.filters).toEqual(plan.filterGraph);
        expect(command.outputOptionList.slice(0, 4)).toEqual([ '-map', '[vx1]', '-map', '[ax1]' ]);
    });

    it('should concatenate losslessly through a concat list it cleans up', async () => {
        const outputPath = path.join(tempDir, 'final_video.mp4');
        let listContent = '';
        ffmpegState.onSave = (command, savedPath) => {
            listContent = fs.readFileSync(command.inputs[ 0 ], 'utf8');
            fs.writeFileSync(savedPath, '');
        };

        await controller.concatLossless([ '/clips/hook.mp4', "/clips/it's.mp4" ], outputPath);

        const [ command ] = ffmpegState.commands;
        expect(command.inputs).toEqual([ `${outputPath}.concat.txt` ]);
        expect(command.inputOptionList).toEqual([ '-f', 'concat', '-safe', '0' ]);
        expect(command.outputOptionList).toEqual([ '-c copy' ]);
        expect(listContent).toBe("file '/clips/hook.mp4'\nfile '/clips/it'\\''s.mp4'");
        expect(fs.existsSync(`${outputPath}.concat.txt`)).toBe(false);
    });

    it('should surface ffmpeg failures as assembly errors and still clean up', async () => {
        ffmpegState.failWith = 'Invalid data found when processing input';
        const outputPath = path.join(tempDir, 'final_video.mp4');

        const error = await controller.concatLossless([ '/clips/hook.mp4' ], outputPath).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(AssemblyError);
        expect(error).toMatchObject({ message: 'ffmpeg failed to lossless concat: Invalid data found when processing input' });
        expect(fs.existsSync(`${outputPath}.concat.txt`)).toBe(false);
    });
});

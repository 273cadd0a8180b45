import fs from 'fs';
import os from 'os';
import path from 'path';
import { AppConfig, loadConfig } from '../../shared/config.js';
import { CrossfadeClip, GenerationClient, MediaProbe, MediaTranscoder, SceneDescription, TaskPoll } from '../../shared/types/index.js';
import { AssemblyError, ExternalServiceError } from '../../shared/utils/errors.js';

export interface MediaEntry {
    durationSeconds: number;
    hasAudio: boolean;
}

/** Stands in for the files on disk: path -> media facts. */
export class MediaStore {
    readonly entries = new Map<string, MediaEntry>();

    set(filePath: string, entry: MediaEntry) {
        this.entries.set(filePath, entry);
    }

    get(filePath: string): MediaEntry {
        const entry = this.entries.get(filePath);
        if (!entry) throw new Error(`No such file: ${filePath}`);
        return entry;
    }
}

export interface VideoCall {
    scenario: string;
    durationSeconds: number;
    seedImage?: string;
    /** 1-based count of submissions for this scenario. */
    attempt: number;
}

export type VideoScript =
    | { outcome: 'success'; durationSeconds?: number; }
    | { outcome: 'poll-error'; message: string; }
    | { outcome: 'submit-error'; error: Error; };

interface FakeTask {
    kind: 'video' | 'audio' | 'image';
    scenario: string;
    resultUri: string;
    durationSeconds: number;
    error?: string;
    polls: number;
}

export function scenarioOf(prompt: string): string {
    const match = /^(?:Visual: )?(\w+)/.exec(prompt);
    return match ? match[ 1 ] : 'unknown';
}

/**
 * In-process generation provider. Each task reports `running` once, then settles.
 * Every call is appended to `events` so tests can check ordering.
 */
export class FakeGenerationClient implements GenerationClient {
    readonly events: string[] = [];
    readonly videoCalls: VideoCall[] = [];
    readonly audioCalls: Array<{ prompt: string; durationSeconds: number; }> = [];
    readonly imageCalls: Array<{ scenario: string; referenceImage?: string; }> = [];
    readonly uploads: string[] = [];

    videoScript: (call: VideoCall) => VideoScript = () => ({ outcome: 'success' });
    failAudioFor = new Set<string>();
    failImageFor = new Set<string>();
    failUploadFor: (imagePath: string) => boolean = () => false;
    /** Delay before a task settles, per scenario and kind. */
    delayMs: (kind: FakeTask[ 'kind' ], scenario: string) => number = () => 0;

    private tasks = new Map<string, FakeTask>();
    private counter = 0;

    constructor(private store: MediaStore) { }

    async submitVideo(prompt: string, durationSeconds: number, seedImage?: string): Promise<string> {
        const scenario = scenarioOf(prompt);
        const attempt = this.videoCalls.filter(c => c.scenario === scenario).length + 1;
        const call: VideoCall = { scenario, durationSeconds, seedImage, attempt };
        this.videoCalls.push(call);
        this.events.push(`submitVideo:${scenario}`);

        const script = this.videoScript(call);
        if (script.outcome === 'submit-error') throw script.error;
        return this.createTask({
            kind: 'video',
            scenario,
            durationSeconds: script.outcome === 'success' ? script.durationSeconds ?? durationSeconds : durationSeconds,
            error: script.outcome === 'poll-error' ? script.message : undefined,
        });
    }

    async submitAudio(prompt: string, durationSeconds: number): Promise<string> {
        const scenario = scenarioOf(prompt);
        this.audioCalls.push({ prompt, durationSeconds });
        this.events.push(`submitAudio:${scenario}`);
        return this.createTask({
            kind: 'audio',
            scenario,
            durationSeconds,
            error: this.failAudioFor.has(scenario) ? 'audio model unavailable' : undefined,
        });
    }

    async submitImage(prompt: string, referenceImage?: string): Promise<string> {
        const scenario = scenarioOf(prompt);
        this.imageCalls.push({ scenario, referenceImage });
        this.events.push(`submitImage:${scenario}`);
        return this.createTask({
            kind: 'image',
            scenario,
            durationSeconds: 0,
            error: this.failImageFor.has(scenario) ? 'image model unavailable' : undefined,
        });
    }

    async poll(taskId: string): Promise<TaskPoll> {
        const task = this.tasks.get(taskId);
        if (!task) throw new ExternalServiceError(`Unknown task ${taskId}`);
        task.polls++;
        if (task.polls === 1) {
            const delay = this.delayMs(task.kind, task.scenario);
            if (delay > 0) await new Promise(resolve => setTimeout(resolve, delay));
            return { status: 'running', progress: 50 };
        }
        if (task.error) return { status: 'error', error: task.error };
        return { status: 'done', resultUri: task.resultUri };
    }

    async uploadReference(imagePath: string): Promise<string> {
        this.events.push(`upload:${path.basename(imagePath)}`);
        if (this.failUploadFor(imagePath)) throw new ExternalServiceError('upload rejected');
        this.uploads.push(imagePath);
        return `ref-${path.basename(imagePath)}`;
    }

    async download(uri: string, destPath: string): Promise<void> {
        const task = [ ...this.tasks.values() ].find(t => t.resultUri === uri);
        if (!task) throw new ExternalServiceError(`Unknown result ${uri}`);
        this.events.push(`download:${path.basename(destPath)}`);
        this.store.set(destPath, { durationSeconds: task.durationSeconds, hasAudio: task.kind === 'audio' });
    }

    private createTask(task: Omit<FakeTask, 'resultUri' | 'polls'>): string {
        const taskId = `task-${++this.counter}`;
        const extension = task.kind === 'video' ? '.mp4' : task.kind === 'audio' ? '.wav' : '.png';
        this.tasks.set(taskId, { ...task, polls: 0, resultUri: `https://results.test/${taskId}${extension}` });
        return taskId;
    }
}

/**
 * Transcoder over the media store. Crossfade output length is simulated by laying
 * clips on a timeline: each new clip starts one transition before the previous ends.
 */
export class FakeTranscoder implements MediaTranscoder {
    readonly calls: string[] = [];
    failCrossfade = false;
    failLossless = false;
    failMergeFor = new Set<string>();

    constructor(private store: MediaStore) { }

    async probe(filePath: string): Promise<MediaProbe> {
        const entry = this.store.get(filePath);
        return { durationSeconds: entry.durationSeconds, width: 1920, height: 1080, hasAudio: entry.hasAudio };
    }

    async extractLastFrame(videoPath: string, outputPath: string): Promise<string> {
        this.store.get(videoPath);
        this.calls.push(`extractLastFrame:${path.basename(videoPath)}`);
        this.store.set(outputPath, { durationSeconds: 0, hasAudio: false });
        return outputPath;
    }

    async merge(videoPath: string, audioPath: string, outputPath: string): Promise<string> {
        this.calls.push(`merge:${path.basename(videoPath)}`);
        if (this.failMergeFor.has(path.basename(videoPath))) throw new AssemblyError('merge rejected');
        this.store.get(audioPath);
        this.store.set(outputPath, { durationSeconds: this.store.get(videoPath).durationSeconds, hasAudio: true });
        return outputPath;
    }

    async concatCrossfade(clips: CrossfadeClip[], transitionSeconds: number, outputPath: string): Promise<string> {
        this.calls.push(`concatCrossfade:${clips.length}`);
        if (this.failCrossfade) throw new AssemblyError('filter graph rejected');
        let timeline = 0;
        clips.forEach((clip, i) => {
            timeline = i === 0 ? clip.durationSeconds : timeline + clip.durationSeconds - transitionSeconds;
        });
        this.store.set(outputPath, { durationSeconds: timeline, hasAudio: true });
        return outputPath;
    }

    async concatLossless(clipPaths: string[], outputPath: string): Promise<string> {
        this.calls.push(`concatLossless:${clipPaths.length}`);
        if (this.failLossless) throw new AssemblyError('concat demuxer failed');
        const total = clipPaths.reduce((sum, p) => sum + this.store.get(p).durationSeconds, 0);
        this.store.set(outputPath, { durationSeconds: total, hasAudio: true });
        return outputPath;
    }
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'scene-chain-test-'));
}

export function testConfig(outputDir: string, overrides: Record<string, string> = {}): AppConfig {
    return loadConfig({
        NODE_ENV: 'test',
        OUTPUT_DIR: outputDir,
        GENERATION_API_KEY: 'test-secret',
        POLL_INTERVAL_MS: '1',
        POLL_TIMEOUT_MS: '5000',
        SEED_SETTLE_DELAY_MS: '0',
        SEED_RETRY_BASE_DELAY_MS: '1',
        ...overrides,
    });
}

export function scene(scenario: string, durationSeconds: number, extra: Partial<SceneDescription> = {}): SceneDescription {
    return { scenario, description: `${scenario} shot of the product`, durationSeconds, ...extra };
}

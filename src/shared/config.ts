import { z } from "zod";



const booleanFlag = z
    .union([ z.boolean(), z.string() ])
    .transform((value) => typeof value === "boolean" ? value : ![ "false", "0", "no", "off" ].includes(value.trim().toLowerCase()));

const durationList = z
    .string()
    .transform((value) => value
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map(Number))
    .pipe(z.array(z.number().positive()));

const EnvSchema = z.object({
    NODE_ENV: z.string().default("development"),
    LOG_LEVEL: z.enum([ "trace", "debug", "info", "warn", "error", "fatal", "silent" ]).default("info"),

    GENERATION_API_URL: z.url().default("http://localhost:8080/v1"),
    GENERATION_API_KEY: z.string().default(""),
    VIDEO_MODEL: z.string().min(1).default("klingai:6@1"),
    AUDIO_MODEL: z.string().min(1).default("mirelo:sfx@1.5"),
    IMAGE_MODEL: z.string().min(1).default("bfl:2@1"),

    OUTPUT_DIR: z.string().min(1).default("outputs"),
    VIDEO_WIDTH: z.coerce.number().int().positive().default(1920),
    VIDEO_HEIGHT: z.coerce.number().int().positive().default(1080),
    IMAGE_WIDTH: z.coerce.number().int().positive().default(1024),
    IMAGE_HEIGHT: z.coerce.number().int().positive().default(1024),

    ACCEPTED_VIDEO_DURATIONS: durationList.default([ 5, 10 ]),
    MAX_AUDIO_DURATION_SECONDS: z.coerce.number().positive().default(10),

    FAN_OUT_CONCURRENCY: z.coerce.number().int().positive().default(4),
    MAX_CONCURRENT_JOBS: z.coerce.number().int().nonnegative().default(0),

    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
    POLL_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),

    SEED_SETTLE_DELAY_MS: z.coerce.number().int().nonnegative().default(3_000),
    SEED_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
    SEED_MAX_SAME_SEED_RETRIES: z.coerce.number().int().nonnegative().default(2),

    FRAME_CONTINUITY: booleanFlag.default(true),
    LAST_FRAME_OFFSET_SECONDS: z.coerce.number().nonnegative().default(0.1),
    TRANSITION_SECONDS: z.coerce.number().positive().default(0.3),
    MIN_STATIC_IMAGES: z.coerce.number().int().nonnegative().default(0),
});

export interface AppConfig {
    readonly env: string;
    readonly logLevel: string;
    readonly generation: {
        readonly apiUrl: string;
        readonly apiKey: string;
        readonly videoModel: string;
        readonly audioModel: string;
        readonly imageModel: string;
        readonly requestTimeoutMs: number;
        readonly pollIntervalMs: number;
        readonly pollTimeoutMs: number;
    };
    readonly media: {
        readonly outputDir: string;
        readonly videoWidth: number;
        readonly videoHeight: number;
        readonly imageWidth: number;
        readonly imageHeight: number;
        readonly lastFrameOffsetSeconds: number;
        readonly transitionSeconds: number;
    };
    readonly pipeline: {
        readonly acceptedVideoDurations: readonly number[];
        readonly maxAudioDurationSeconds: number;
        readonly fanOutConcurrency: number;
        readonly maxConcurrentJobs: number;
        readonly frameContinuity: boolean;
        readonly seedSettleDelayMs: number;
        readonly seedRetryBaseDelayMs: number;
        readonly maxSameSeedRetries: number;
        readonly minStaticImages: number;
    };
}

/**
 * Validates the environment and maps it onto the grouped application config.
 * Throws a single error naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const invalid = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join(", ");
        throw new Error(`Invalid environment configuration: ${invalid}`);
    }
    const e = parsed.data;

    return Object.freeze({
        env: e.NODE_ENV,
        logLevel: e.LOG_LEVEL,
        generation: Object.freeze({
            apiUrl: e.GENERATION_API_URL.replace(/\/+$/, ""),
            apiKey: e.GENERATION_API_KEY,
            videoModel: e.VIDEO_MODEL,
            audioModel: e.AUDIO_MODEL,
            imageModel: e.IMAGE_MODEL,
            requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
            pollIntervalMs: e.POLL_INTERVAL_MS,
            pollTimeoutMs: e.POLL_TIMEOUT_MS,
        }),
        media: Object.freeze({
            outputDir: e.OUTPUT_DIR,
            videoWidth: e.VIDEO_WIDTH,
            videoHeight: e.VIDEO_HEIGHT,
            imageWidth: e.IMAGE_WIDTH,
            imageHeight: e.IMAGE_HEIGHT,
            lastFrameOffsetSeconds: e.LAST_FRAME_OFFSET_SECONDS,
            transitionSeconds: e.TRANSITION_SECONDS,
        }),
        pipeline: Object.freeze({
            acceptedVideoDurations: Object.freeze([ ...e.ACCEPTED_VIDEO_DURATIONS ].sort((a, b) => a - b)),
            maxAudioDurationSeconds: e.MAX_AUDIO_DURATION_SECONDS,
            fanOutConcurrency: e.FAN_OUT_CONCURRENCY,
            maxConcurrentJobs: e.MAX_CONCURRENT_JOBS,
            frameContinuity: e.FRAME_CONTINUITY,
            seedSettleDelayMs: e.SEED_SETTLE_DELAY_MS,
            seedRetryBaseDelayMs: e.SEED_RETRY_BASE_DELAY_MS,
            maxSameSeedRetries: e.SEED_MAX_SAME_SEED_RETRIES,
            minStaticImages: e.MIN_STATIC_IMAGES,
        }),
    });
}

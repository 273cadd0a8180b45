import fs from "fs";
import path from "path";
import { z } from "zod";
import { GenerationClient, TaskPoll } from "../types/index.js";
import { ExternalServiceError, SeedTransferError, extractErrorMessage, isSeedTransferFailure } from "../utils/errors.js";
import { logger } from "../logger.js";



export interface HttpGenerationClientOptions {
    apiUrl: string;
    apiKey: string;
    videoModel: string;
    audioModel: string;
    imageModel: string;
    requestTimeoutMs: number;
    videoWidth: number;
    videoHeight: number;
    imageWidth: number;
    imageHeight: number;
    fetchImpl?: typeof fetch;
}

const TaskAccepted = z.object({ taskId: z.string().min(1) });
const ReferenceAccepted = z.object({ handle: z.string().min(1) });

type TaskType = "videoInference" | "audioInference" | "imageInference";

const MIME_TYPES: Record<string, string> = {
    ".png": "image/png",
    ".jpg": "image/jpeg",
    ".jpeg": "image/jpeg",
    ".webp": "image/webp",
};

/**
 * Generation client over a task-queue REST API:
 * `POST /tasks`, `GET /tasks/:id`, `POST /references`, and plain GET for results.
 */
export class HttpGenerationClient implements GenerationClient {
    private fetchImpl: typeof fetch;

    constructor(private options: HttpGenerationClientOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async submitVideo(prompt: string, durationSeconds: number, seedImage?: string): Promise<string> {
        return this.submitTask("videoInference", {
            model: this.options.videoModel,
            prompt,
            durationSeconds,
            width: this.options.videoWidth,
            height: this.options.videoHeight,
            ...(seedImage ? { frameImages: [ { inputImage: seedImage, frame: "first" } ] } : {}),
        });
    }

    async submitAudio(prompt: string, durationSeconds: number): Promise<string> {
        return this.submitTask("audioInference", {
            model: this.options.audioModel,
            prompt,
            durationSeconds,
        });
    }

    async submitImage(prompt: string, referenceImage?: string): Promise<string> {
        return this.submitTask("imageInference", {
            model: this.options.imageModel,
            prompt,
            width: this.options.imageWidth,
            height: this.options.imageHeight,
            ...(referenceImage ? { referenceImages: [ referenceImage ] } : {}),
        });
    }

    async poll(taskId: string): Promise<TaskPoll> {
        const body = await this.request("GET", `/tasks/${encodeURIComponent(taskId)}`);
        return this.parse(TaskPoll, body, "poll");
    }

    async uploadReference(imagePath: string): Promise<string> {
        const data = await fs.promises.readFile(imagePath);
        const mimeType = MIME_TYPES[ path.extname(imagePath).toLowerCase() ] ?? "application/octet-stream";
        const body = await this.request("POST", "/references", {
            image: `data:${mimeType};base64,${data.toString("base64")}`,
        });
        const { handle } = this.parse(ReferenceAccepted, body, "uploadReference");
        logger.debug({ imagePath, handle }, "Reference image registered");
        return handle;
    }

    async download(uri: string, destPath: string): Promise<void> {
        const response = await this.send(uri, { method: "GET" });
        if (!response.ok) {
            throw new ExternalServiceError(`Download failed: HTTP ${response.status}`, { uri, status: response.status });
        }
        await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
        await fs.promises.writeFile(destPath, Buffer.from(await response.arrayBuffer()));
        logger.debug({ uri, destPath }, "Downloaded generation result");
    }

    private async submitTask(taskType: TaskType, payload: Record<string, unknown>): Promise<string> {
        const body = await this.request("POST", "/tasks", { taskType, ...payload });
        const { taskId } = this.parse(TaskAccepted, body, taskType);
        logger.info({ taskType, taskId }, "Generation task submitted");
        return taskId;
    }

    private async request(method: "GET" | "POST", route: string, payload?: unknown): Promise<unknown> {
        const response = await this.send(`${this.options.apiUrl}${route}`, {
            method,
            headers: {
                "Content-Type": "application/json",
                ...(this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {}),
            },
            body: payload === undefined ? undefined : JSON.stringify(payload),
        });

        const text = await response.text();
        if (!response.ok) {
            const details = { route, status: response.status };
            if (isSeedTransferFailure(text)) {
                throw new SeedTransferError(text, details);
            }
            throw new ExternalServiceError(`Generation API ${method} ${route} failed: HTTP ${response.status} ${text}`.trim(), details);
        }

        try {
            return text ? JSON.parse(text) : {};
        } catch (error) {
            throw new ExternalServiceError(`Generation API returned invalid JSON for ${route}`, { route }, error);
        }
    }

    private async send(url: string, init: RequestInit): Promise<Response> {
        try {
            return await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.options.requestTimeoutMs) });
        } catch (error) {
            throw new ExternalServiceError(`Request to ${url} failed: ${extractErrorMessage(error)}`, { url }, error);
        }
    }

    private parse<T>(schema: z.ZodType<T>, body: unknown, operation: string): T {
        const result = schema.safeParse(body);
        if (!result.success) {
            throw new ExternalServiceError(`Unexpected ${operation} response`, { issues: result.error.issues.map(i => i.message) });
        }
        return result.data;
    }
}

//shared/types/generation.types.ts

import { z } from "zod";



export const TASK_STATUSES = [ "queued", "running", "done", "error" ] as const;
export type TaskStatus = (typeof TASK_STATUSES)[ number ];

export const TaskPoll = z.object({
    status: z.enum(TASK_STATUSES),
    resultUri: z.string().optional(),
    error: z.string().optional(),
    progress: z.number().min(0).max(100).optional(),
});
export type TaskPoll = z.infer<typeof TaskPoll>;

/**
 * Remote image, video and audio generation. Submissions return a task id to poll;
 * references are images registered with the provider for use as video seeds.
 */
export interface GenerationClient {
    submitVideo(prompt: string, durationSeconds: number, seedImage?: string): Promise<string>;
    submitAudio(prompt: string, durationSeconds: number): Promise<string>;
    /** `referenceImage` is a registered handle that makes the request image-to-image. */
    submitImage(prompt: string, referenceImage?: string): Promise<string>;
    poll(taskId: string): Promise<TaskPoll>;
    uploadReference(imagePath: string): Promise<string>;
    download(uri: string, destPath: string): Promise<void>;
}

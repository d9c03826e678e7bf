import { z } from 'zod';
import { TaskEntity, taskState } from './task.entity';

/** Version of the on-disk task file layout. Bump when fields change meaning. */
export const TASK_FILE_VERSION = 1;

const taskErrorSchema = z.object({
    kind: z.enum(['InputError', 'TransientError', 'AuthError', 'FatalGatewayError']),
    code: z.string(),
    message: z.string(),
    at: z.coerce.date(),
});

const taskProgressSchema = z.object({
    fraction: z.number().min(0).max(1),
    bytes_done: z.number().nonnegative(),
    bytes_total: z.number().nonnegative(),
});

// Accepts rows from Postgres (Date objects) as well as parsed JSON (ISO strings).
export const taskSchema: z.ZodType<TaskEntity, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    source: z.string().min(1),
    state: z.nativeEnum(taskState),
    download_handle: z.string().nullable(),
    name: z.string().nullable(),
    progress: taskProgressSchema.nullable(),
    local_path: z.string().nullable(),
    remote_path: z.string().nullable(),
    error: taskErrorSchema.nullable(),
    retry_count: z.number().int().nonnegative(),
    next_attempt_at: z.coerce.date().nullable(),
    created_at: z.coerce.date(),
    updated_at: z.coerce.date(),
});

export const taskFileSchema = z.object({
    version: z.literal(TASK_FILE_VERSION),
    task: taskSchema,
});

export type TaskFile = z.infer<typeof taskFileSchema>;

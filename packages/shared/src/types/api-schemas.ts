import { z } from 'zod';
import { TASK_STATUSES } from './automation.interface.js';

/**
 * Task submission body
 */
export const SubmitTaskSchema = z.object({
    goal: z
        .string({ required_error: 'Goal is required' })
        .trim()
        .min(1, 'Goal must not be empty')
        .max(500, 'Goal too long'),
    /** Page to start from instead of the category's site */
    url: z
        .string()
        .trim()
        .url('Url must be absolute')
        .refine(value => /^https?:\/\//i.test(value), 'Url must use http or https')
        .optional()
});

export type SubmitTaskRequest = z.infer<typeof SubmitTaskSchema>;

export const TaskIdParamSchema = z.object({
    id: z.string().uuid('Invalid task id')
});

export const ListTasksQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(20),
    status: z.enum(TASK_STATUSES).optional()
});

export type ListTasksQuery = z.infer<typeof ListTasksQuerySchema>;

/**
 * Validation Error Response
 */
export function formatValidationError(error: z.ZodError) {
    return {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: error.issues.map(err => ({
            field: err.path.join('.'),
            message: err.message,
            code: err.code
        }))
    };
}

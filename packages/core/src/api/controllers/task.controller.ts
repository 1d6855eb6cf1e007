import type { Request, Response, NextFunction } from 'express';
import {
    ListTasksQuerySchema,
    NotFoundError,
    SubmitTaskSchema,
    TaskIdParamSchema,
    ValidationError,
    container,
    formatValidationError,
    successResponse
} from '@webpilot/shared';
import type { z } from 'zod';
import type { TaskManager } from '../../services/task-manager.js';
import { CoreTokens } from '../../di/bootstrap.js';

function invalid(error: z.ZodError): ValidationError {
    const formatted = formatValidationError(error);
    return new ValidationError(formatted.message, formatted.details);
}

export class TaskController {
    private readonly tasks: TaskManager;

    constructor(tasks?: TaskManager) {
        this.tasks = tasks ?? container.resolve(CoreTokens.TaskManager);
    }

    /**
     * Accept a goal and start it in the background
     */
    submit(req: Request, res: Response, next: NextFunction): void {
        try {
            const parsed = SubmitTaskSchema.safeParse(req.body);
            if (!parsed.success) {
                throw invalid(parsed.error);
            }

            const task = this.tasks.submit(parsed.data.goal, { startUrl: parsed.data.url });

            res.status(202).json(successResponse({
                taskId: task.id,
                status: task.status,
                statusUrl: `/api/v1/tasks/${task.id}`
            }, { requestId: req.id }));
        } catch (error: unknown) {
            next(error);
        }
    }

    get(req: Request, res: Response, next: NextFunction): void {
        try {
            const params = TaskIdParamSchema.safeParse(req.params);
            if (!params.success) {
                // A malformed id can never name a task
                throw new NotFoundError('Task', String(req.params.id));
            }

            res.json(successResponse(this.tasks.get(params.data.id), { requestId: req.id }));
        } catch (error: unknown) {
            next(error);
        }
    }

    list(req: Request, res: Response, next: NextFunction): void {
        try {
            const query = ListTasksQuerySchema.safeParse(req.query);
            if (!query.success) {
                throw invalid(query.error);
            }

            const tasks = this.tasks.list(query.data);
            res.json(successResponse(tasks, { requestId: req.id, count: tasks.length }));
        } catch (error: unknown) {
            next(error);
        }
    }
}

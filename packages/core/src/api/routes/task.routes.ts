import { Router } from 'express';
import { TaskController } from '../controllers/task.controller.js';
import type { TaskManager } from '../../services/task-manager.js';

export function createTaskRouter(tasks?: TaskManager): Router {
    const router = Router();
    const controller = new TaskController(tasks);

    /**
     * POST /api/v1/tasks  { goal }  → 202 { taskId, status, statusUrl }
     */
    router.post('/', controller.submit.bind(controller));

    /**
     * GET /api/v1/tasks?limit=&status=  → newest first
     */
    router.get('/', controller.list.bind(controller));

    /**
     * GET /api/v1/tasks/:id  → task snapshot with plan, trace and results
     */
    router.get('/:id', controller.get.bind(controller));

    return router;
}

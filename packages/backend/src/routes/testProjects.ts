import { Router, Request, Response } from 'express';
import { TestProjectService } from '../services/testProjectService';
import { parseProjectId, validateProjectBody } from '../middleware/validation';
import { asyncHandler } from '../utils/asyncHandler';
import { CreateTestProjectRequest, UpdateTestProjectRequest } from '@testprojects/shared';

// No try/catch here: unexpected faults go to the global error middleware.
export function createTestProjectsRouter(projectService: TestProjectService): Router {
  const router = Router();

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const projects = await projectService.getAllProjects();
    res.json(projects);
  }));

  router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const project = await projectService.getProjectById(parseProjectId(req.params.id));
    res.json(project);
  }));

  router.post('/', validateProjectBody, asyncHandler(async (req: Request, res: Response) => {
    const data: CreateTestProjectRequest = req.body;
    const project = await projectService.createProject(data);
    res.status(201).json(project);
  }));

  router.put('/:id', validateProjectBody, asyncHandler(async (req: Request, res: Response) => {
    const data: UpdateTestProjectRequest = req.body;
    const result = await projectService.updateProject(parseProjectId(req.params.id), data);
    res.json(result);
  }));

  router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
    const result = await projectService.deleteProject(parseProjectId(req.params.id));
    res.json(result);
  }));

  return router;
}

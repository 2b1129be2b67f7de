import { TestProjectStore } from '../repositories/testProjectRepository';
import { NotFoundError } from '../errors/httpError';
import {
  CreateTestProjectRequest,
  MessageResponse,
  TestProject,
  TestProjectRow,
  UpdateTestProjectRequest,
} from '@testprojects/shared';

export class TestProjectService {
  constructor(private readonly projectRepo: TestProjectStore) {}

  async getAllProjects(): Promise<TestProjectRow[]> {
    return await this.projectRepo.findAll();
  }

  async getProjectById(id: number): Promise<TestProjectRow> {
    const project = await this.projectRepo.findById(id);
    if (!project) {
      throw new NotFoundError();
    }
    return project;
  }

  async createProject(data: CreateTestProjectRequest): Promise<TestProject> {
    return await this.projectRepo.create(data);
  }

  async updateProject(id: number, data: UpdateTestProjectRequest): Promise<MessageResponse> {
    const updated = await this.projectRepo.update(id, data.name);
    if (!updated) {
      throw new NotFoundError();
    }
    return { message: 'Updated successfully' };
  }

  async deleteProject(id: number): Promise<MessageResponse> {
    const deleted = await this.projectRepo.delete(id);
    if (!deleted) {
      throw new NotFoundError();
    }
    return { message: 'Deleted successfully' };
  }
}

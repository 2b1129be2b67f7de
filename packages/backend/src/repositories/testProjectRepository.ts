import { withConnection } from '../config/database';
import { AppConfig } from '../config/env';
import { CreateTestProjectRequest, TestProject, TestProjectRow } from '@testprojects/shared';

export interface TestProjectStore {
  findAll(): Promise<TestProjectRow[]>;
  findById(id: number): Promise<TestProjectRow | null>;
  create(data: CreateTestProjectRequest): Promise<TestProject>;
  update(id: number, name: string): Promise<boolean>;
  delete(id: number): Promise<boolean>;
}

export class TestProjectRepository implements TestProjectStore {
  constructor(private readonly config: AppConfig) {}

  async findAll(): Promise<TestProjectRow[]> {
    return withConnection(this.config, async (client) => {
      const result = await client.query<TestProjectRow>('SELECT "Id", "Name" FROM "TestProjects" ORDER BY "Id"');
      return result.rows;
    });
  }

  async findById(id: number): Promise<TestProjectRow | null> {
    return withConnection(this.config, async (client) => {
      const result = await client.query<TestProjectRow>(
        'SELECT "Id", "Name" FROM "TestProjects" WHERE "Id" = $1',
        [id]
      );
      return result.rows[0] || null;
    });
  }

  async create(data: CreateTestProjectRequest): Promise<TestProject> {
    return withConnection(this.config, async (client) => {
      const result = await client.query<Pick<TestProjectRow, 'Id'>>(
        'INSERT INTO "TestProjects" ("Name") VALUES ($1) RETURNING "Id"',
        [data.name]
      );
      return { id: result.rows[0].Id, name: data.name };
    });
  }

  async update(id: number, name: string): Promise<boolean> {
    return withConnection(this.config, async (client) => {
      const result = await client.query('UPDATE "TestProjects" SET "Name" = $1 WHERE "Id" = $2', [name, id]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  async delete(id: number): Promise<boolean> {
    return withConnection(this.config, async (client) => {
      const result = await client.query('DELETE FROM "TestProjects" WHERE "Id" = $1', [id]);
      return (result.rowCount ?? 0) > 0;
    });
  }
}

export interface TestProject {
  id?: number;
  name: string;
}

// Rows come back with the store's column names.
export interface TestProjectRow {
  Id: number;
  Name: string;
}

export interface CreateTestProjectRequest {
  name: string;
}

export interface UpdateTestProjectRequest {
  name: string;
}

export interface MessageResponse {
  message: string;
}

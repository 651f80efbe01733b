/** Project -- belongs to one workspace, optionally to a team of that workspace. */
export interface Project {
  id: number;
  name: string;
  description: string | null;
  workspace_id: number;
  team_id: number | null;
  owner_id: number;
  is_public: boolean;
  created_at: string;
  updated_at: string;
}

/** Row as stored; `is_public` is 0 or 1. */
export interface ProjectRow extends Omit<Project, "is_public"> {
  is_public: number;
}

export interface CreateProjectInput {
  workspace_id: number;
  name: string;
  description?: string | null;
  team_id?: number | null;
  is_public?: boolean;
}

export interface UpdateProjectInput {
  name?: string;
  description?: string | null;
  team_id?: number | null;
  is_public?: boolean;
}

export interface Tag {
  id: number;
  name: string;
  color: string | null;
  workspace_id: number;
  created_at: string;
}

export interface CreateTagInput {
  workspace_id: number;
  name: string;
  color?: string | null;
}

export interface UpdateTagInput {
  name?: string;
  color?: string | null;
}

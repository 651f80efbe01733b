/** Workspace -- root of the hierarchy and the unit of membership. */
export interface Workspace {
  id: number;
  name: string;
  owner_id: number;
  created_at: string;
  updated_at: string;
}

export interface CreateWorkspaceInput {
  name: string;
}

export interface UpdateWorkspaceInput {
  name?: string;
}

export interface ListWorkspacesOptions {
  /** Every workspace in the system. Requires the admin capability. */
  all?: boolean;
}

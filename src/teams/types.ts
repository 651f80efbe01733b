export interface Team {
  id: number;
  name: string;
  workspace_id: number;
  created_at: string;
}

export interface TeamWithMembers extends Team {
  member_ids: number[];
}

export interface CreateTeamInput {
  workspace_id: number;
  name: string;
}

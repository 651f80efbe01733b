export interface Section {
  id: number;
  name: string;
  project_id: number;
  position: number;
  created_at: string;
}

export interface CreateSectionInput {
  project_id: number;
  name: string;
  /** Defaults to one past the current last position. */
  position?: number;
}

export interface UpdateSectionInput {
  name?: string;
  position?: number;
}

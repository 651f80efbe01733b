/** Task -- unit of work in a project; subtasks point at their parent through `parent_task_id`. */
export interface Task {
  id: number;
  name: string;
  description: string | null;
  project_id: number;
  section_id: number | null;
  parent_task_id: number | null;
  assignee_id: number | null;
  creator_id: number;
  due_date: string | null;
  /** null while the task is open */
  completed_at: string | null;
  completed: boolean;
  position: number;
  created_at: string;
  updated_at: string;
}

export type TaskRow = Omit<Task, "completed">;

export interface CreateTaskInput {
  project_id: number;
  name: string;
  description?: string | null;
  section_id?: number | null;
  parent_task_id?: number | null;
  assignee_id?: number | null;
  due_date?: string | null;
  completed?: boolean;
  position?: number;
}

export interface UpdateTaskInput {
  name?: string;
  description?: string | null;
  section_id?: number | null;
  parent_task_id?: number | null;
  assignee_id?: number | null;
  due_date?: string | null;
  completed?: boolean;
  position?: number;
  /** Tasks never move between projects; any other value is rejected. */
  project_id?: number;
}

export interface TaskFilters {
  workspace_id?: number;
  project_id?: number;
  section_id?: number;
  tag_id?: number;
  /** `null` restricts to top-level tasks. */
  parent_task_id?: number | null;
  /** A principal id, or "me" for the caller. */
  assignee?: number | "me";
  completed?: boolean;
  /** ISO-8601 instant; only tasks completed at or after it match. */
  completed_since?: string;
  limit?: number;
  offset?: number;
}

export interface PaginationMeta {
  total: number;
  limit: number;
  offset: number;
}

export interface TaskPage {
  data: Task[];
  pagination: PaginationMeta;
}

export interface Comment {
  id: number;
  text: string;
  task_id: number;
  author_id: number;
  created_at: string;
  updated_at: string;
}

export interface CreateCommentInput {
  task_id: number;
  text: string;
}

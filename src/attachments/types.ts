export interface Attachment {
  id: number;
  filename: string;
  /** Opaque locator of the stored bytes; never dereferenced here. */
  reference: string;
  task_id: number | null;
  comment_id: number | null;
  uploader_id: number;
  created_at: string;
}

/** Exactly one of the two must be set. */
export interface AttachmentTarget {
  task_id?: number | null;
  comment_id?: number | null;
}

export interface CreateAttachmentInput extends AttachmentTarget {
  filename: string;
  reference: string;
}

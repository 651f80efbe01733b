/** Account known to the system. Soft-mode hints are matched against `email`. */
export interface User {
  id: number;
  email: string;
  name: string;
  created_at: string;
}

export interface CreateUserInput {
  email: string;
  name: string;
  /** Explicit id, used when seeding the fallback account. */
  id?: number;
}

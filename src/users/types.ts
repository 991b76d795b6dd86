export interface User {
  id: number;
  username: string;
  created_at: string;
}

export interface Session {
  id: string;
  token: string;
  user_id: number;
  expires_at: string;
}

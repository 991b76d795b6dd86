export const REQUEST_STATUSES = ["pending", "approved", "rejected"] as const;
export type RequestStatus = (typeof REQUEST_STATUSES)[number];

export type MemberRole = "owner" | "member";

export interface Member {
  user_id: number;
  username: string;
  role: MemberRole;
  joined_at: string;
}

export interface JoinRequest {
  id: number;
  project_id: number;
  user_id: number;
  username: string;
  status: RequestStatus;
  requested_at: string;
}

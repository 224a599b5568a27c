// AUTHENTICATION

export interface LoginDTO {
  adminId?: unknown;
  password?: unknown;
}

export interface AdminIdentity {
  id: string;
}

export interface AuthData {
  admin: AdminIdentity;
  token: string;
}

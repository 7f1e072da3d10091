export interface Admin {
  id: string;
  username: string;
  passwordHash: string;
  createdAt: Date;
}

export interface AdminProfile {
  id: string;
  username: string;
  createdAt: Date;
}

export function toAdminProfile(admin: Admin): AdminProfile {
  return { id: admin.id, username: admin.username, createdAt: admin.createdAt };
}

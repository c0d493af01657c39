import type { User } from '../../shared/database/entities';

export interface UserPayload {
  id: number;
  email: string;
  name: string;
}

export function toUserPayload(user: User): UserPayload {
  return { id: user.id, email: user.email, name: user.fullName };
}

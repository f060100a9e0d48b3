// src/usecases/auth/user-profile.mapper.ts
import type { UserProfileView } from '@app-types/models/user.types';
import type { UserEntity } from '@modules/user/user.entity';

export const toUserProfile = (user: UserEntity): UserProfileView => ({
  id: user.id,
  username: user.username,
  email: user.email,
  role: user.role,
  date_joined: user.dateJoined.toISOString(),
});

// src/usecases/auth/get-profile.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { UserProfileView } from '@app-types/models/user.types';
import { ACCOUNT_ERROR, DomainError } from '@core/common/errors/domain-error';
import { requireUser } from '@core/course/policy/course-access.policy';
import { UserService } from '@modules/user/user.service';
import { Injectable } from '@nestjs/common';
import { toUserProfile } from './user-profile.mapper';

@Injectable()
export class GetProfileUsecase {
  constructor(private readonly userService: UserService) {}

  async execute(actor: Actor): Promise<UserProfileView> {
    const { id } = requireUser(actor);
    const user = await this.userService.findById(id);
    if (!user) throw new DomainError(ACCOUNT_ERROR.USER_NOT_FOUND, 'User not found.', { id });
    return toUserProfile(user);
  }
}

// src/types/models/user.types.ts

/**
 * 用户角色枚举（注册时确定，不提供晋升流程）
 */
export enum UserRole {
  ADMIN = 'admin',
  INSTRUCTOR = 'instructor',
  STUDENT = 'student',
}

/** 允许自助注册的角色（admin 仅能通过 seed 创建） */
export const SELF_REGISTRABLE_ROLES: ReadonlyArray<UserRole> = [
  UserRole.STUDENT,
  UserRole.INSTRUCTOR,
];

/** 可拥有课程的角色（仅在创建课程时校验） */
export const COURSE_OWNER_ROLES: ReadonlyArray<UserRole> = [UserRole.ADMIN, UserRole.INSTRUCTOR];

/**
 * 用户资料视图（对外输出）
 */
export interface UserProfileView {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly role: UserRole;
  // eslint-disable-next-line @typescript-eslint/naming-convention
  readonly date_joined: string;
}

/**
 * 类型守卫：判断字符串是否为合法角色
 */
export function isUserRole(value: unknown): value is UserRole {
  return (
    typeof value === 'string' && (Object.values(UserRole) as ReadonlyArray<string>).includes(value)
  );
}

// src/modules/account/user.service.ts
import { ACCOUNT_ERROR, DomainError } from '@core/common/errors/domain-error';
import { PasswordPbkdf2Helper } from '@core/common/password/password.pbkdf2.helper';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { UserEntity } from './user.entity';

/** 创建用户的数据（密码为明文，由服务负责哈希） */
export interface CreateUserData {
  readonly username: string;
  readonly password: string;
  readonly email?: string;
  readonly firstName?: string;
  readonly lastName?: string;
  readonly phone?: string;
  readonly address?: string | null;
  readonly roleId?: number | null;
  readonly isActive?: boolean;
  readonly isStaff?: boolean;
  readonly isSuperuser?: boolean;
}

export type UpdateUserData = Partial<Omit<CreateUserData, 'username' | 'password'>> & {
  readonly username?: string;
  readonly password?: string;
};

const USER_COLUMNS = {
  id: 'user.id',
  username: 'user.username',
  firstName: 'user.firstName',
  lastName: 'user.lastName',
  isActive: 'user.isActive',
  roleId: 'user.roleId',
} as const;

/**
 * 用户服务
 * 写操作一律走 save / remove，并携带操作人，供变更历史订阅器记录
 */
@Injectable()
export class UserService {
  constructor(
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
    private readonly searchService: SearchService,
  ) {}

  private repo(manager?: EntityManager): Repository<UserEntity> {
    return manager ? manager.getRepository(UserEntity) : this.userRepository;
  }

  async findById(id: number, manager?: EntityManager): Promise<UserEntity | null> {
    return this.repo(manager).findOne({ where: { id }, relations: ['role'] });
  }

  async getOrThrow(id: number, manager?: EntityManager): Promise<UserEntity> {
    const user = await this.findById(id, manager);
    if (!user) throw new DomainError(ACCOUNT_ERROR.USER_NOT_FOUND, 'User not found.', { id });
    return user;
  }

  async findByUsername(username: string): Promise<UserEntity | null> {
    return this.userRepository.findOne({ where: { username }, relations: ['role'] });
  }

  /** 按邮箱查找启用中的用户（邮箱不唯一，取最早注册的一个） */
  async findActiveByEmail(email: string): Promise<UserEntity | null> {
    return this.userRepository.findOne({
      where: { email, isActive: true },
      order: { id: 'ASC' },
    });
  }

  async search(params: SearchParams): Promise<SearchResult<UserEntity>> {
    return this.searchService.search({
      qb: this.userRepository.createQueryBuilder('user').leftJoinAndSelect('user.role', 'role'),
      params,
      options: {
        searchColumns: [
          'user.username',
          'user.email',
          'user.firstName',
          'user.lastName',
          'user.phone',
        ],
        allowedFilters: ['isActive', 'roleId'],
        resolveColumn: columnResolver(USER_COLUMNS),
        allowedSorts: ['id', 'username', 'firstName', 'lastName'],
        defaultSorts: [{ field: 'username', direction: 'ASC' }],
      },
    });
  }

  /** 启用中的用户 ID（可按角色过滤） */
  async findActiveIds(filter: { readonly roleId?: number } = {}): Promise<number[]> {
    const rows = await this.userRepository.find({
      select: { id: true },
      where: { isActive: true, ...(filter.roleId !== undefined ? { roleId: filter.roleId } : {}) },
    });
    return rows.map((row) => row.id);
  }

  async create(
    data: CreateUserData,
    actor: string | null,
    manager?: EntityManager,
  ): Promise<UserEntity> {
    const salt = PasswordPbkdf2Helper.generateSalt();
    const user = this.repo(manager).create({
      username: data.username.trim(),
      email: data.email ?? '',
      firstName: data.firstName ?? '',
      lastName: data.lastName ?? '',
      phone: data.phone ?? '',
      address: data.address ?? null,
      roleId: data.roleId ?? null,
      isActive: data.isActive ?? true,
      isStaff: data.isStaff ?? false,
      isSuperuser: data.isSuperuser ?? false,
      passwordSalt: salt,
      passwordHash: PasswordPbkdf2Helper.hashPasswordWithCrypto(data.password, salt),
      lastLogin: null,
    });
    return this.persist(user, actor, manager);
  }

  async update(
    id: number,
    patch: UpdateUserData,
    actor: string | null,
    manager?: EntityManager,
  ): Promise<UserEntity> {
    const user = await this.getOrThrow(id, manager);
    const { password, ...fields } = patch;
    // merge 会跳过 undefined 字段
    const next = this.repo(manager).merge(user, fields);
    if (password !== undefined) this.applyPassword(next, password);
    // 关系对象与 roleId 并存时以 roleId 为准
    if (fields.roleId !== undefined) next.role = undefined;
    return this.persist(next, actor, manager);
  }

  async changePassword(
    user: UserEntity,
    password: string,
    actor: string | null,
  ): Promise<UserEntity> {
    this.applyPassword(user, password);
    return this.persist(user, actor);
  }

  /** 登录成功后记录时间 */
  async touchLastLogin(user: UserEntity, at: Date = new Date()): Promise<void> {
    user.lastLogin = at;
    await this.userRepository.save(user, { data: { actor: user.username } });
  }

  async remove(id: number, actor: string | null): Promise<void> {
    const user = await this.getOrThrow(id);
    await this.userRepository.remove(user, { data: { actor } });
  }

  verifyPassword(user: UserEntity, password: string): boolean {
    return PasswordPbkdf2Helper.verifyPasswordWithCrypto(
      password,
      user.passwordSalt,
      user.passwordHash,
    );
  }

  private applyPassword(user: UserEntity, password: string): void {
    user.passwordSalt = PasswordPbkdf2Helper.generateSalt();
    user.passwordHash = PasswordPbkdf2Helper.hashPasswordWithCrypto(password, user.passwordSalt);
  }

  private async persist(
    user: UserEntity,
    actor: string | null,
    manager?: EntityManager,
  ): Promise<UserEntity> {
    try {
      return await this.repo(manager).save(user, { data: { actor } });
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          ACCOUNT_ERROR.USERNAME_ALREADY_EXISTS,
          'A user with that username already exists.',
          { username: user.username },
          error,
        );
      }
      throw error;
    }
  }
}

// src/modules/account/role.service.ts
import { ACCOUNT_ERROR, DomainError } from '@core/common/errors/domain-error';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RoleEntity } from './role.entity';

export interface RoleInput {
  readonly name: string;
  readonly description?: string | null;
}

/**
 * 角色服务
 */
@Injectable()
export class RoleService {
  constructor(
    @InjectRepository(RoleEntity)
    private readonly roleRepository: Repository<RoleEntity>,
    private readonly searchService: SearchService,
  ) {}

  async findById(id: number): Promise<RoleEntity | null> {
    return this.roleRepository.findOne({ where: { id } });
  }

  async getOrThrow(id: number): Promise<RoleEntity> {
    const role = await this.findById(id);
    if (!role) throw new DomainError(ACCOUNT_ERROR.ROLE_NOT_FOUND, 'Role not found.', { id });
    return role;
  }

  async search(params: SearchParams): Promise<SearchResult<RoleEntity>> {
    return this.searchService.search({
      qb: this.roleRepository.createQueryBuilder('role'),
      params,
      options: {
        searchColumns: ['role.name', 'role.description'],
        resolveColumn: columnResolver({ id: 'role.id', name: 'role.name' }),
        allowedSorts: ['id', 'name'],
        defaultSorts: [{ field: 'name', direction: 'ASC' }],
      },
    });
  }

  async create(input: RoleInput): Promise<RoleEntity> {
    const role = this.roleRepository.create({
      name: input.name.trim(),
      description: input.description ?? null,
    });
    return this.persist(role);
  }

  async update(id: number, patch: Partial<RoleInput>): Promise<RoleEntity> {
    const role = await this.getOrThrow(id);
    if (patch.name !== undefined) role.name = patch.name.trim();
    if (patch.description !== undefined) role.description = patch.description;
    return this.persist(role);
  }

  async remove(id: number): Promise<void> {
    const role = await this.getOrThrow(id);
    await this.roleRepository.remove(role);
  }

  private async persist(role: RoleEntity): Promise<RoleEntity> {
    try {
      return await this.roleRepository.save(role);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          ACCOUNT_ERROR.ROLE_ALREADY_EXISTS,
          'Role with this name already exists.',
          { name: role.name },
          error,
        );
      }
      throw error;
    }
  }
}

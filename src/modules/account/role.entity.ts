// src/modules/account/role.entity.ts
import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

/**
 * 角色实体
 * 对应数据库表：roles
 * 业务分类（如 Trainer），不参与接口鉴权
 */
@Entity('roles')
@Unique('uk_roles_name', ['name'])
export class RoleEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'name', type: 'varchar', length: 50, comment: '角色名称' })
  name!: string;

  @Column({ name: 'description', type: 'text', nullable: true, comment: '角色说明' })
  description!: string | null;
}

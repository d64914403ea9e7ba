// src/modules/account/user.entity.ts
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { RoleEntity } from './role.entity';

/**
 * 用户实体
 * 对应数据库表：users
 * 密码以 PBKDF2 哈希 + 独立盐存储，任何对外输出都不应包含这两个字段
 */
@Entity('users')
@Unique('uk_users_username', ['username'])
@Index('idx_users_email', ['email'])
@Index('idx_users_role', ['roleId'])
export class UserEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'username', type: 'varchar', length: 150, comment: '登录名' })
  username!: string;

  @Column({ name: 'email', type: 'varchar', length: 254, default: '', comment: '邮箱' })
  email!: string;

  @Column({ name: 'first_name', type: 'varchar', length: 150, default: '', comment: '名' })
  firstName!: string;

  @Column({ name: 'last_name', type: 'varchar', length: 150, default: '', comment: '姓' })
  lastName!: string;

  @Column({ name: 'phone', type: 'varchar', length: 15, default: '', comment: '手机号' })
  phone!: string;

  @Column({ name: 'address', type: 'text', nullable: true, comment: '地址' })
  address!: string | null;

  @Column({ name: 'password_hash', type: 'varchar', length: 255, comment: 'PBKDF2 哈希' })
  passwordHash!: string;

  @Column({ name: 'password_salt', type: 'varchar', length: 64, comment: '密码盐' })
  passwordSalt!: string;

  /** 角色 ID（角色删除时置空） */
  @Column({ name: 'role_id', type: 'int', nullable: true, comment: '引用 roles.id' })
  roleId!: number | null;

  @ManyToOne(() => RoleEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'role_id' })
  role?: RoleEntity | null;

  @Column({ name: 'is_active', type: 'boolean', default: true, comment: '是否启用' })
  isActive!: boolean;

  @Column({ name: 'is_staff', type: 'boolean', default: false, comment: '是否员工' })
  isStaff!: boolean;

  @Column({ name: 'is_superuser', type: 'boolean', default: false, comment: '是否超级管理员' })
  isSuperuser!: boolean;

  @CreateDateColumn({ name: 'date_joined', type: 'timestamp', comment: '注册时间' })
  dateJoined!: Date;

  @Column({ name: 'last_login', type: 'datetime', nullable: true, comment: '最近登录时间' })
  lastLogin!: Date | null;
}

/** 对外展示的姓名：名 + 姓，均为空时回退到用户名 */
export function displayName(user: Pick<UserEntity, 'firstName' | 'lastName' | 'username'>): string {
  return fullName(user) || user.username;
}

/** 全名：名 + 姓，可能为空字符串 */
export function fullName(user: Pick<UserEntity, 'firstName' | 'lastName'>): string {
  return `${user.firstName} ${user.lastName}`.trim();
}

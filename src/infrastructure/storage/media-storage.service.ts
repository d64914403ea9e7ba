// src/infrastructure/storage/media-storage.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, stat, unlink, writeFile } from 'fs/promises';
import { PinoLogger } from 'nestjs-pino';
import { dirname, isAbsolute, normalize, resolve, sep } from 'path';

/**
 * 本地媒体存储
 * 数据库中只保存相对路径（如 certificates/pdfs/CERT-20240101-0001.pdf）
 */
@Injectable()
export class MediaStorageService {
  private readonly root: string;
  private readonly publicUrl: string;

  constructor(
    config: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(MediaStorageService.name);
    this.root = resolve(config.get<string>('storage.mediaRoot', './media'));
    this.publicUrl = config.get<string>('storage.mediaUrl', '/media').replace(/\/+$/, '');
  }

  /** 静态文件挂载用：根目录与 URL 前缀 */
  get mount(): { readonly root: string; readonly prefix: string } {
    return { root: this.root, prefix: this.publicUrl };
  }

  async save(relativePath: string, content: Buffer): Promise<string> {
    const target = this.resolvePath(relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
    this.logger.debug({ path: relativePath, bytes: content.length }, '文件已写入');
    return toPosix(normalize(relativePath));
  }

  async read(relativePath: string): Promise<Buffer> {
    return readFile(this.resolvePath(relativePath));
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      const info = await stat(this.resolvePath(relativePath));
      return info.isFile();
    } catch {
      return false;
    }
  }

  async remove(relativePath: string): Promise<void> {
    if (!(await this.exists(relativePath))) return;
    await unlink(this.resolvePath(relativePath));
  }

  /** 对外访问地址 */
  urlFor(relativePath: string | null): string | null {
    if (!relativePath) return null;
    return `${this.publicUrl}/${toPosix(relativePath)}`;
  }

  /**
   * 解析到媒体根目录下的绝对路径，禁止越出根目录
   */
  resolvePath(relativePath: string): string {
    if (!relativePath || isAbsolute(relativePath)) {
      throw new Error(`非法的媒体路径: ${relativePath}`);
    }
    const target = resolve(this.root, relativePath);
    if (target !== this.root && !target.startsWith(this.root + sep)) {
      throw new Error(`非法的媒体路径: ${relativePath}`);
    }
    return target;
  }
}

function toPosix(p: string): string {
  return p.split(sep).join('/');
}

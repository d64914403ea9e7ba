// src/infrastructure/storage/media-storage.service.spec.ts
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { mkdtemp, rm } from 'fs/promises';
import { PinoLogger } from 'nestjs-pino';
import { tmpdir } from 'os';
import { join } from 'path';
import { MediaStorageService } from './media-storage.service';

describe('MediaStorageService', () => {
  let root: string;
  let storage: MediaStorageService;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'media-'));
    const moduleRef = await Test.createTestingModule({
      providers: [
        MediaStorageService,
        {
          provide: ConfigService,
          useValue: new ConfigService({ storage: { mediaRoot: root, mediaUrl: '/media/' } }),
        },
        { provide: PinoLogger, useValue: { setContext: jest.fn(), debug: jest.fn() } },
      ],
    }).compile();
    storage = moduleRef.get(MediaStorageService);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('写入后可读取，返回相对路径', async () => {
    const saved = await storage.save('certificates/pdfs/CERT-1.pdf', Buffer.from('pdf-bytes'));

    expect(saved).toBe('certificates/pdfs/CERT-1.pdf');
    expect(await storage.exists(saved)).toBe(true);
    expect((await storage.read(saved)).toString()).toBe('pdf-bytes');
  });

  it('不存在的文件 exists 为 false，remove 不报错', async () => {
    expect(await storage.exists('finance/receipts/none.pdf')).toBe(false);
    await expect(storage.remove('finance/receipts/none.pdf')).resolves.toBeUndefined();
  });

  it('拒绝越出根目录的路径', () => {
    expect(() => storage.resolvePath('../etc/passwd')).toThrow('非法的媒体路径: ../etc/passwd');
    expect(() => storage.resolvePath('/etc/passwd')).toThrow('非法的媒体路径: /etc/passwd');
  });

  it('urlFor 拼接公开前缀', () => {
    expect(storage.urlFor('students/photos/a.png')).toBe('/media/students/photos/a.png');
    expect(storage.urlFor(null)).toBeNull();
  });
});

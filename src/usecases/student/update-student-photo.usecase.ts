// src/usecases/student/update-student-photo.usecase.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { DomainError, STUDENT_ERROR } from '@core/common/errors/domain-error';
import { MediaStorageService } from '@src/infrastructure/storage/media-storage.service';
import { StudentEntity } from '@modules/student/student.entity';
import { StudentService } from '@modules/student/student.service';
import { Injectable } from '@nestjs/common';
import { extname } from 'path';
import { PinoLogger } from 'nestjs-pino';

export const PHOTO_DIR = 'students/photos';

export interface UploadedPhoto {
  readonly originalname: string;
  readonly buffer: Buffer;
}

/**
 * 学员上传本人照片
 * 新文件写入成功后再删除旧文件
 */
@Injectable()
export class UpdateStudentPhotoUsecase {
  constructor(
    private readonly studentService: StudentService,
    private readonly storage: MediaStorageService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(UpdateStudentPhotoUsecase.name);
  }

  async execute(session: UsecaseSession, photo: UploadedPhoto | undefined): Promise<StudentEntity> {
    if (!photo || photo.buffer.length === 0) {
      throw new DomainError(STUDENT_ERROR.PHOTO_REQUIRED, 'No photo was submitted.');
    }
    const student = await this.studentService.getByUserIdOrThrow(session.accountId);
    const ext = extname(photo.originalname).toLowerCase() || '.jpg';
    const stored = await this.storage.save(
      `${PHOTO_DIR}/${student.regNo}-${Date.now()}${ext}`,
      photo.buffer,
    );

    const previous = student.photo;
    await this.studentService.update(student.id, { photo: stored }, session.username);
    if (previous && previous !== stored) {
      await this.storage.remove(previous).catch((error: unknown) => {
        this.logger.warn(
          { path: previous, error: error instanceof Error ? error.message : String(error) },
          '旧照片删除失败',
        );
      });
    }
    return this.studentService.getOrThrow(student.id);
  }
}

// src/adapters/api/account/history.controller.ts
import { AccessRole } from '@app-types/models/account.types';
import type { PaginatedResult } from '@core/pagination/pagination.policy';
import {
  AuditHistoryService,
  type StudentHistoryRow,
  type UserHistoryRow,
} from '@modules/audit/audit-history.service';
import { Controller, Get, Query } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { Roles } from '../decorators/roles.decorator';
import { ListQueryDto, toPagination } from '../dto/list-query.dto';

/**
 * 变更历史（只读）
 */
@ApiTags('history')
@ApiBearerAuth()
@Roles(AccessRole.ADMIN)
@Controller('history')
export class HistoryController {
  constructor(private readonly auditHistoryService: AuditHistoryService) {}

  @Get('users')
  async users(@Query() query: ListQueryDto): Promise<PaginatedResult<UserHistoryRow>> {
    return this.auditHistoryService.listUserHistory(toPagination(query));
  }

  @Get('students')
  async students(@Query() query: ListQueryDto): Promise<PaginatedResult<StudentHistoryRow>> {
    return this.auditHistoryService.listStudentHistory(toPagination(query));
  }
}

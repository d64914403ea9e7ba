// src/core/certificate/certificate.policy.ts
import { nextSequenceNo } from '@core/common/numeric/sequence';

/** 签发日期 YYYY-MM-DD 对应的编号前缀 CERT-{YYYYMMDD}- */
export function certificateNoPrefix(issueDate: string): string {
  return `CERT-${issueDate.replace(/-/g, '')}-`;
}

/**
 * 证书编号：CERT-{YYYYMMDD}-{当日序号补齐 4 位}
 * @param lastNo 当日已用的最大编号
 */
export function buildCertificateNo(issueDate: string, lastNo: string | null): string {
  return nextSequenceNo(certificateNoPrefix(issueDate), lastNo, 4);
}

/**
 * 课程时长文本：12 周为 3 Month，24 周为 6 Month，其余按周显示
 * 无课程或时长为 0 时返回空串
 */
export function durationText(durationWeeks: number | null | undefined): string {
  if (!durationWeeks) return '';
  if (durationWeeks === 12) return '3 Month';
  if (durationWeeks === 24) return '6 Month';
  return `${durationWeeks} Week`;
}

/** 证书校验链接 */
export function buildVerifyUrl(frontendUrl: string, qrHash: string): string {
  return `${frontendUrl.replace(/\/+$/, '')}/verify?hash=${qrHash}`;
}

/** 未结课提示文案 */
export function notCompletedMessage(presentDays: number, requiredDays: number): string {
  return `Student has not completed this course. Attendance: ${presentDays}/${requiredDays} days.`;
}

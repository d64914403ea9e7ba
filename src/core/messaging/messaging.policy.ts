// src/core/messaging/messaging.policy.ts

const PREVIEW_LENGTH = 50;

/**
 * 最近消息预览：超过 50 个字符时截断并追加 '...'
 */
export function messagePreview(body: string | null | undefined): string | null {
  if (body === null || body === undefined) return null;
  const chars = Array.from(body);
  if (chars.length <= PREVIEW_LENGTH) return body;
  return `${chars.slice(0, PREVIEW_LENGTH).join('')}...`;
}

export type ConversationSide = 'student' | 'admin';

/**
 * 新消息到达后的已读标记：发送方已读，接收方未读
 */
export function readFlagsAfterSend(senderSide: ConversationSide): {
  studentRead: boolean;
  adminRead: boolean;
} {
  return senderSide === 'student'
    ? { studentRead: true, adminRead: false }
    : { studentRead: false, adminRead: true };
}

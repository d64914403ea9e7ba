// src/core/messaging/messaging.policy.spec.ts
import { messagePreview, readFlagsAfterSend } from './messaging.policy';

describe('messaging.policy', () => {
  it('短消息原样返回', () => {
    expect(messagePreview('hello')).toBe('hello');
    expect(messagePreview(null)).toBeNull();
  });

  it('超过 50 个字符时截断', () => {
    const body = 'a'.repeat(49) + 'bcd';
    expect(messagePreview(body)).toBe('a'.repeat(49) + 'b...');
    expect(messagePreview('x'.repeat(50))).toBe('x'.repeat(50));
  });

  it('发送方已读、接收方未读', () => {
    expect(readFlagsAfterSend('student')).toEqual({ studentRead: true, adminRead: false });
    expect(readFlagsAfterSend('admin')).toEqual({ studentRead: false, adminRead: true });
  });
});

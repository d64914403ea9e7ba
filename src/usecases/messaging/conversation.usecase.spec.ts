// src/usecases/messaging/conversation.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { DomainError, MESSAGING_ERROR, STUDENT_ERROR } from '@core/common/errors/domain-error';
import { MessagingService } from '@modules/messaging/messaging.service';
import { StudentService } from '@modules/student/student.service';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import {
  CONVERSATION_NOT_FOUND_MESSAGE,
  ConversationUsecase,
  STUDENT_PROFILE_NOT_FOUND_MESSAGE,
} from './conversation.usecase';

describe('ConversationUsecase', () => {
  const messagingService = {
    findAllConversations: jest.fn(),
    latestMessages: jest.fn(),
    findConversation: jest.fn(),
    findByStudent: jest.fn(),
    getOrCreateForStudent: jest.fn(),
    listMessages: jest.fn(),
    markRead: jest.fn(),
    send: jest.fn(),
  };
  const studentService = { findByUserId: jest.fn(), getByUserIdOrThrow: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn() };
  const staff: UsecaseSession = { accountId: 1, username: 'office', roles: ['STAFF'] };
  const student: UsecaseSession = { accountId: 20, username: 'meena', roles: ['STUDENT'] };
  const lastMessageAt = new Date('2024-05-01T10:00:00Z');
  const conversation = {
    id: 4,
    studentId: 7,
    createdAt: lastMessageAt,
    lastMessageAt,
    studentRead: false,
    adminRead: true,
    student: { userId: 20, regNo: 'STU2024-001', user: { firstName: 'Meena', lastName: 'Rao', username: 'meena' } },
  };
  let usecase: ConversationUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        ConversationUsecase,
        { provide: MessagingService, useValue: messagingService },
        { provide: StudentService, useValue: studentService },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(ConversationUsecase);
  });

  it('员工列表带学员信息与最近消息预览', async () => {
    messagingService.findAllConversations.mockResolvedValue([conversation]);
    messagingService.latestMessages.mockResolvedValue(new Map([[4, { body: 'x'.repeat(60) }]]));

    const [view] = await usecase.list(staff);

    expect(view).toMatchObject({
      id: 4,
      studentName: 'Meena Rao',
      studentRegNo: 'STU2024-001',
      lastMessagePreview: `${'x'.repeat(50)}...`,
    });
    expect(view.messages).toBeUndefined();
  });

  it('学员访问他人会话得到未找到', async () => {
    messagingService.findConversation.mockResolvedValue({ ...conversation, student: { userId: 99 } });

    await expect(usecase.get(student, 4)).rejects.toMatchObject({
      code: MESSAGING_ERROR.CONVERSATION_NOT_FOUND,
      message: CONVERSATION_NOT_FOUND_MESSAGE,
    });
  });

  it('学员读取消息时标记学员侧已读', async () => {
    messagingService.findConversation.mockResolvedValue(conversation);
    messagingService.listMessages.mockResolvedValue([
      {
        id: 1,
        conversationId: 4,
        senderId: 20,
        body: 'Hello',
        sentAt: lastMessageAt,
        sender: { firstName: 'Meena', lastName: 'Rao', username: 'meena' },
      },
      {
        id: 2,
        conversationId: 4,
        senderId: 1,
        body: 'Hi',
        sentAt: lastMessageAt,
        sender: { firstName: '', lastName: '', username: 'office' },
      },
    ]);

    const messages = await usecase.messages(student, 4);

    expect(messagingService.markRead).toHaveBeenCalledWith(conversation, 'student');
    expect(messages.map((m) => [m.senderName, m.isFromStudent])).toEqual([
      ['Meena Rao', true],
      ['office', false],
    ]);
  });

  it('员工发消息时以管理员身份发送', async () => {
    messagingService.findConversation.mockResolvedValue(conversation);
    messagingService.send.mockResolvedValue({
      id: 3,
      conversationId: 4,
      senderId: 1,
      body: 'Class moved to 10am',
      sentAt: lastMessageAt,
    });

    const message = await usecase.send(staff, 4, 'Class moved to 10am');

    expect(messagingService.send).toHaveBeenCalledWith({
      conversationId: 4,
      senderId: 1,
      senderSide: 'admin',
      body: 'Class moved to 10am',
    });
    expect(message.isFromStudent).toBe(false);
  });

  it('无学员档案时 my-conversation 返回 404 文案', async () => {
    studentService.getByUserIdOrThrow.mockRejectedValue(
      new DomainError(STUDENT_ERROR.PROFILE_NOT_FOUND, STUDENT_PROFILE_NOT_FOUND_MESSAGE),
    );

    await expect(usecase.mine(student)).rejects.toMatchObject({ message: STUDENT_PROFILE_NOT_FOUND_MESSAGE });
    expect(studentService.getByUserIdOrThrow).toHaveBeenCalledWith(20, STUDENT_PROFILE_NOT_FOUND_MESSAGE);
  });
});

// src/infrastructure/mail/mail.service.spec.ts
import sgMail from '@sendgrid/mail';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { MailService } from './mail.service';

jest.mock('@sendgrid/mail', () => ({
  __esModule: true,
  default: { setApiKey: jest.fn(), send: jest.fn() },
}));

describe('MailService', () => {
  const logger = { setContext: jest.fn(), info: jest.fn() };

  const build = async (mail: Record<string, string>): Promise<MailService> => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        MailService,
        { provide: ConfigService, useValue: new ConfigService({ mail }) },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    return moduleRef.get(MailService);
  };

  it('未配置 API Key 时跳过发送', async () => {
    const service = await build({ sendgridApiKey: '', from: 'office@test.local' });

    const result = await service.send({ to: 'a@test.local', subject: 'Fee Reminder', text: 'hi' });

    expect(result).toBe('skipped');
    expect(sgMail.send).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith(
      { to: 'a@test.local', subject: 'Fee Reminder' },
      '未配置 SendGrid，跳过发送',
    );
  });

  it('配置后使用发件人发送', async () => {
    jest.mocked(sgMail.send).mockResolvedValue([
      { statusCode: 202, body: {}, headers: {} },
      {},
    ]);
    const service = await build({ sendgridApiKey: 'test-secret', from: 'office@test.local' });

    const result = await service.send({ to: 'a@test.local', subject: 'Fee Reminder', text: 'hi' });

    expect(result).toBe('sent');
    expect(sgMail.setApiKey).toHaveBeenCalledWith('test-secret');
    expect(sgMail.send).toHaveBeenCalledWith({
      to: 'a@test.local',
      from: 'office@test.local',
      subject: 'Fee Reminder',
      text: 'hi',
    });
  });

  it('发送失败时抛出错误', async () => {
    jest.mocked(sgMail.send).mockRejectedValue(new Error('Unauthorized'));
    const service = await build({ sendgridApiKey: 'test-secret', from: 'office@test.local' });

    await expect(
      service.send({ to: 'a@test.local', subject: 'Fee Reminder', text: 'hi' }),
    ).rejects.toThrow('Unauthorized');
  });
});

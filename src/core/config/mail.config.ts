// src/core/config/mail.config.ts

const mailConfig = () => ({
  mail: {
    // 为空时邮件只记录日志，不实际发送
    sendgridApiKey: process.env.SENDGRID_API_KEY || '',
    from: process.env.MAIL_FROM || 'no-reply@institute.local',
  },
});

export default mailConfig;

// src/core/certificate/certificate.policy.spec.ts
import {
  buildCertificateNo,
  certificateNoPrefix,
  buildVerifyUrl,
  durationText,
  notCompletedMessage,
} from './certificate.policy';

describe('certificate.policy', () => {
  it('证书编号包含签发日期与当日序号', () => {
    expect(certificateNoPrefix('2024-03-05')).toBe('CERT-20240305-');
    expect(buildCertificateNo('2024-03-05', null)).toBe('CERT-20240305-0001');
    expect(buildCertificateNo('2024-12-31', 'CERT-20241231-0011')).toBe('CERT-20241231-0012');
  });

  it('当日中间的证书被删除后仍接着最大编号续号', () => {
    // 0001..0003 中删除 0002，剩余最大为 0003
    expect(buildCertificateNo('2024-03-05', 'CERT-20240305-0003')).toBe('CERT-20240305-0004');
  });

  it('时长文本', () => {
    expect(durationText(12)).toBe('3 Month');
    expect(durationText(24)).toBe('6 Month');
    expect(durationText(8)).toBe('8 Week');
    expect(durationText(null)).toBe('');
  });

  it('校验链接去掉末尾斜杠', () => {
    expect(buildVerifyUrl('http://localhost:5173/', 'abc')).toBe('http://localhost:5173/verify?hash=abc');
  });

  it('未结课提示', () => {
    expect(notCompletedMessage(14, 20)).toBe(
      'Student has not completed this course. Attendance: 14/20 days.',
    );
  });
});

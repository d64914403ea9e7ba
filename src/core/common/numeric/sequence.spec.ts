// src/core/common/numeric/sequence.spec.ts
import { nextSequenceNo } from './sequence';

describe('nextSequenceNo', () => {
  it('没有已用编号时从 1 开始', () => {
    expect(nextSequenceNo('STU2024-', null, 3)).toBe('STU2024-001');
  });

  it('在最大编号的序号上加 1', () => {
    expect(nextSequenceNo('CERT-20240305-', 'CERT-20240305-0007', 4)).toBe('CERT-20240305-0008');
    expect(nextSequenceNo('STU2024-', 'STU2024-999', 3)).toBe('STU2024-1000');
  });

  it('前缀不符或尾部不是数字时视为无已用编号', () => {
    expect(nextSequenceNo('STU2025-', 'STU2024-042', 3)).toBe('STU2025-001');
    expect(nextSequenceNo('STU2024-', 'STU2024-A1', 3)).toBe('STU2024-001');
  });
});

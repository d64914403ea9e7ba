// src/types/models/account.types.spec.ts
import { AccessRole, buildAccessGroup } from './account.types';

describe('buildAccessGroup', () => {
  it('superuser 同时拥有 ADMIN 与 STAFF', () => {
    expect(buildAccessGroup({ isSuperuser: true, isStaff: false })).toEqual([
      AccessRole.ADMIN,
      AccessRole.STAFF,
    ]);
  });

  it('staff 只有 STAFF，普通账户为 STUDENT', () => {
    expect(buildAccessGroup({ isSuperuser: false, isStaff: true })).toEqual([AccessRole.STAFF]);
    expect(buildAccessGroup({ isSuperuser: false, isStaff: false })).toEqual([AccessRole.STUDENT]);
  });
});

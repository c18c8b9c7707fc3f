import { CapabilityService } from './capability.service';

describe('CapabilityService', () => {
  let service: CapabilityService;

  beforeEach(() => {
    service = new CapabilityService();
  });

  it('should grant admins every action on every resource', () => {
    expect(service.can('admin', 'film', 'write')).toBe(true);
    expect(service.can('admin', 'user', 'administer')).toBe(true);
    expect(service.can('admin', 'audit', 'read')).toBe(true);
  });

  it('should let managers read and write domain records but not administer users', () => {
    expect(service.can('manager', 'casting', 'write')).toBe(true);
    expect(service.can('manager', 'audit', 'read')).toBe(true);
    expect(service.can('manager', 'audit', 'write')).toBe(false);
    expect(service.can('manager', 'user', 'administer')).toBe(false);
    expect(service.can('manager', 'user', 'read')).toBe(false);
  });

  it('should restrict viewers to reads', () => {
    expect(service.can('viewer', 'film', 'read')).toBe(true);
    expect(service.can('viewer', 'report', 'read')).toBe(true);
    expect(service.can('viewer', 'film', 'write')).toBe(false);
    expect(service.can('viewer', 'audit', 'read')).toBe(false);
  });

  it('should list one capability per resource for a role', () => {
    const capabilities = service.getCapabilities('viewer');

    expect(capabilities).toHaveLength(9);
    expect(capabilities.find((c) => c.resource === 'equipment')).toEqual({
      resource: 'equipment',
      actions: ['read'],
    });
  });
});

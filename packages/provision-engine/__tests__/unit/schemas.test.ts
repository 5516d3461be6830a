import { describe, it, expect } from 'vitest';
import {
  ConfigMutationSchema,
  HostFileSchema,
  ProvisioningResultSchema,
  SandboxNameSchema,
  StepListSchema,
  StepSchema,
} from '../../src/dsl/schemas.js';

describe('StepSchema', () => {
  describe('run steps', () => {
    it('should validate a run step', () => {
      const step = {
        type: 'run',
        description: 'Updating apt',
        command: ['apt-get', 'update'],
      };
      const result = StepSchema.parse(step);
      expect(result.type).toBe('run');
      expect(result.command).toEqual(['apt-get', 'update']);
    });

    it('should keep the debug flag', () => {
      const step = {
        type: 'run',
        description: 'Installing packages',
        command: ['apt-get', 'install', '-y', 'nginx'],
        debug: true,
      };
      expect(StepSchema.parse(step).debug).toBe(true);
    });

    it('should reject an empty command', () => {
      const step = { type: 'run', description: 'Nothing', command: [] };
      const result = StepSchema.safeParse(step);
      expect(result.success).toBe(false);
      expect(result.error?.issues.map(issue => issue.path.join('.'))).toEqual(['command']);
    });

    it('should reject a command without a program name', () => {
      const step = { type: 'run', description: 'Nothing', command: ['', 'arg'] };
      expect(() => StepSchema.parse(step)).toThrow();
    });

    it('should reject an empty description', () => {
      const step = { type: 'run', description: '', command: ['true'] };
      expect(() => StepSchema.parse(step)).toThrow();
    });
  });

  describe('pipe steps', () => {
    it('should validate a pipe step', () => {
      const step = {
        type: 'pipe',
        description: 'Setting user password',
        hostCommand: ['printf', '%s\\n', 'acme_user:test-secret'],
        command: ['chpasswd'],
      };
      const result = StepSchema.parse(step);
      expect(result.type).toBe('pipe');
      if (result.type === 'pipe') {
        expect(result.hostCommand[0]).toBe('printf');
      }
    });

    it('should require a host command', () => {
      const step = { type: 'pipe', description: 'Piping', command: ['cat'] };
      expect(() => StepSchema.parse(step)).toThrow();
    });
  });

  it('should reject an unknown step type', () => {
    const step = { type: 'copy', description: 'Copying', command: ['cp'] };
    expect(() => StepSchema.parse(step)).toThrow();
  });

  it('should validate a list of steps', () => {
    const steps = [
      { type: 'run', description: 'One', command: ['true'] },
      { type: 'pipe', description: 'Two', hostCommand: ['printf', '%s', 'x'], command: ['cat'] },
    ];
    expect(StepListSchema.parse(steps)).toHaveLength(2);
  });
});

describe('ConfigMutationSchema', () => {
  it('should validate clear, append and set', () => {
    expect(ConfigMutationSchema.parse({ type: 'clear', key: 'lxc.idmap' })).toEqual({
      type: 'clear',
      key: 'lxc.idmap',
    });
    expect(ConfigMutationSchema.parse({ type: 'append', key: 'lxc.idmap', value: 'u 0 100000 1000' }).type).toBe(
      'append'
    );
    expect(ConfigMutationSchema.parse({ type: 'set', key: 'lxc.start.auto', value: '1' }).type).toBe('set');
  });

  it('should reject keys that are not config keys', () => {
    expect(() => ConfigMutationSchema.parse({ type: 'clear', key: 'lxc idmap' })).toThrow();
    expect(() => ConfigMutationSchema.parse({ type: 'clear', key: 'Lxc.idmap' })).toThrow();
  });

  it('should require a value for append', () => {
    expect(() => ConfigMutationSchema.parse({ type: 'append', key: 'lxc.idmap' })).toThrow();
    expect(() => ConfigMutationSchema.parse({ type: 'append', key: 'lxc.idmap', value: '' })).toThrow();
  });
});

describe('HostFileSchema', () => {
  it('should validate an absolute path with a mode', () => {
    const file = { path: '/var/lib/lxc/acme/start-pydev', contents: '#!/bin/sh\n', mode: 0o744 };
    expect(HostFileSchema.parse(file).mode).toBe(0o744);
  });

  it('should reject relative paths', () => {
    expect(() => HostFileSchema.parse({ path: 'start-pydev', contents: '', mode: 0o744 })).toThrow();
  });

  it('should reject modes outside the permission bits', () => {
    expect(() => HostFileSchema.parse({ path: '/tmp/x', contents: '', mode: 0o10000 })).toThrow();
    expect(() => HostFileSchema.parse({ path: '/tmp/x', contents: '', mode: -1 })).toThrow();
  });
});

describe('ProvisioningResultSchema', () => {
  it('should accept a flat record of strings', () => {
    const result = { container_name: 'acme_postgresql_bookworm', container_address: '10.0.3.17' };
    expect(ProvisioningResultSchema.parse(result)).toEqual(result);
  });

  it('should reject non-string values', () => {
    expect(() => ProvisioningResultSchema.parse({ port: 5432 })).toThrow();
  });
});

describe('SandboxNameSchema', () => {
  it('should accept prefix_role_release names', () => {
    expect(SandboxNameSchema.parse('acme_postgresql_bookworm')).toBe('acme_postgresql_bookworm');
  });

  it('should reject names with spaces or slashes', () => {
    expect(() => SandboxNameSchema.parse('acme postgresql')).toThrow();
    expect(() => SandboxNameSchema.parse('../acme')).toThrow();
  });
});

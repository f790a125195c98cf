import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_FEATURES } from '../../config/defaults.js';
import { createDefaultGlobalData } from '../../global/defaults.js';
import type { HandlerContextOptions } from '../context.js';
import { createHandlerContext } from '../context.js';
import { DiagnosticCollector } from '../diagnostics.js';
import { buildDirectiveTable } from '../registry.js';
import { TokenLine } from '../token-line.js';

function setup(overrides: Partial<Omit<HandlerContextOptions, 'data' | 'diagnostics'>> = {}) {
  const collector = new DiagnosticCollector();
  const ctx = createHandlerContext({
    ...overrides,
    data: createDefaultGlobalData(),
    diagnostics: collector,
  });
  const table = buildDirectiveTable(DEFAULT_FEATURES);
  return {
    data: ctx.data,
    collector,
    run: (...tokens: string[]) => table.dispatch(TokenLine.of(...tokens), ctx),
  };
}

describe('instance', () => {
  it('should keep the first name and report the second once', () => {
    const { data, run, collector } = setup();

    run('instance', 'foo');
    run('instance', 'bar');

    expect(data.control.instanceName).toBe('foo');
    expect(data.control.usePidDir).toBe(true);
    expect(collector.diagnostics).toEqual([
      {
        level: 'info',
        directive: 'instance',
        message: "instance is already set to 'foo' - ignoring 'bar'",
      },
    ]);
  });

  it('should be skipped entirely on reload', () => {
    const { data, run, collector } = setup({ reload: true });

    expect(run('instance', 'foo')).toBe('frozen');
    expect(data.control.instanceName).toBeUndefined();
    expect(collector.diagnostics).toEqual([]);
  });
});

describe('net_namespace', () => {
  it('should keep the first namespace and imply use_pid_dir', () => {
    const { data, run, collector } = setup();

    run('net_namespace', 'blue');
    run('net_namespace', 'red');

    expect(data.control.networkNamespace.name).toBe('blue');
    expect(data.control.usePidDir).toBe(true);
    expect(collector.diagnostics).toHaveLength(1);
  });

  it('should require a name', () => {
    const { data, run, collector } = setup();

    run('net_namespace');

    expect(data.control.networkNamespace.name).toBeUndefined();
    expect(collector.diagnostics[0]).toEqual({
      level: 'info',
      directive: 'net_namespace',
      message: 'net_namespace requires a namespace name',
    });
  });

  it('should not exist without namespaces', () => {
    const table = buildDirectiveTable({ ...DEFAULT_FEATURES, namespaces: false });

    expect(table.has('net_namespace')).toBe(false);
    expect(table.has('namespace_with_ipsets')).toBe(false);
    expect(table.has('instance')).toBe(true);
  });
});

describe('process control toggles', () => {
  it('should set each toggle', () => {
    const { data, run } = setup();

    run('linkbeat_use_polling');
    run('namespace_with_ipsets');
    run('use_pid_dir', 'yes');
    run('enable_script_security');

    expect(data.control.linkbeatUsePolling).toBe(true);
    expect(data.control.networkNamespace.withIpsets).toBe(true);
    expect(data.control.usePidDir).toBe(true);
    expect(data.control.scriptSecurity).toBe(true);
  });

  it('should treat global_defs as a section opener with no effect', () => {
    const { data, run, collector } = setup();

    expect(run('global_defs', '{')).toBe('handled');
    expect(data).toEqual(createDefaultGlobalData());
    expect(collector.diagnostics).toEqual([]);
  });
});

describe('child_wait_time', () => {
  it('should store seconds', () => {
    const { data, run } = setup();

    run('child_wait_time', '10');

    expect(data.control.childWaitTime).toBe(10);
  });

  it('should reject a non-integer and keep the default', () => {
    const { data, run, collector } = setup();

    run('child_wait_time', 'ten');

    expect(data.control.childWaitTime).toBe(5);
    expect(collector.diagnostics[0]?.message).toBe(
      "Invalid child_wait_time value 'ten' (expected an integer between 0 and 4294967295)"
    );
  });
});

describe('script_user', () => {
  it('should accept a POSIX user and group', () => {
    const { data, run } = setup();

    run('script_user', 'notify_runner', 'nogroup');

    expect(data.control.scriptUser).toEqual({ user: 'notify_runner', group: 'nogroup' });
  });

  it('should reject an invalid user name', () => {
    const { data, run, collector } = setup();

    run('script_user', '1user');

    expect(data.control.scriptUser).toBeUndefined();
    expect(collector.diagnostics[0]?.message).toBe("Unable to set default script user '1user'");
  });

  it('should name the group when the group is rejected', () => {
    const { run, collector } = setup();

    run('script_user', 'scripts', 'bad:group');

    expect(collector.diagnostics[0]?.message).toBe(
      "Unable to set default script user 'scripts' group 'bad:group'"
    );
  });

  it('should delegate to the configured lookup', () => {
    const lookup = vi.fn((user: string, group: string | undefined) =>
      user === 'scripts' ? { user, group: group ?? 'scripts' } : undefined
    );
    const { data, run } = setup({ scriptUsers: lookup });

    run('script_user', 'scripts');

    expect(lookup).toHaveBeenCalledWith('scripts', undefined);
    expect(data.control.scriptUser).toEqual({ user: 'scripts', group: 'scripts' });
  });
});

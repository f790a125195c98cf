import { describe, expect, it, vi } from 'vitest';
import { getDefaultSettings } from '../config/parser.js';
import { serializeGlobalConfig } from '../global/snapshot.js';
import { Logger } from '../utils/logger.js';
import { DiagnosticCollector } from './diagnostics.js';
import { parseGlobalDefs, runParsePass } from './pass.js';
import { TokenLine } from './token-line.js';

const quiet = new Logger({ component: 'GlobalDefs', debugMode: false });

const SAMPLE = `
global_defs {
  router_id lb-1                # comment
  notification_email {
    ops@example.test
    oncall@example.test
  }
  notification_email_from lb@example.test
  smtp_server 192.0.2.25 2525
  vrrp_version 3
  vrrp_garp_master_delay 10
  instance alpha
  net_namespace blue
}
`;

describe('parseGlobalDefs', () => {
  it('should assemble the record from configuration text', () => {
    const { config, diagnostics } = parseGlobalDefs(SAMPLE, { logger: quiet });

    expect(diagnostics).toEqual([]);
    expect(config.mail.routerId).toBe('lb-1');
    expect(config.mail.emailTo).toEqual(['ops@example.test', 'oncall@example.test']);
    expect(config.mail.emailFrom).toBe('lb@example.test');
    expect(config.mail.smtpServer).toEqual({ family: 'ipv4', address: '192.0.2.25', port: 2525 });
    expect(config.vrrp.version).toBe(3);
    expect(config.vrrp.garpDelay).toBe(10_000_000);
    expect(config.control.instanceName).toBe('alpha');
    expect(config.control.networkNamespace.name).toBe('blue');
    expect(config.control.usePidDir).toBe(true);
  });

  it('should produce identical snapshots for identical input', () => {
    const first = parseGlobalDefs(SAMPLE, { logger: quiet });
    const second = parseGlobalDefs(SAMPLE, { logger: quiet });

    expect(serializeGlobalConfig(second.config)).toBe(serializeGlobalConfig(first.config));
  });

  it('should return a frozen snapshot', () => {
    const { config } = parseGlobalDefs(SAMPLE, { logger: quiet });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.mail)).toBe(true);
    expect(Object.isFrozen(config.mail.emailTo)).toBe(true);
  });

  it('should keep the first instance name and report the second', () => {
    const { config, diagnostics } = parseGlobalDefs('instance foo\ninstance bar', { logger: quiet });

    expect(config.control.instanceName).toBe('foo');
    expect(diagnostics).toEqual([
      { level: 'info', directive: 'instance', message: "instance is already set to 'foo' - ignoring 'bar'" },
    ]);
  });

  it('should read a block whose brace is on the following line', () => {
    const text = [
      'global_defs {',
      '  notification_email',
      '  {',
      '    a@example.test',
      '  }',
      '  router_id lb-4',
      '}',
    ].join('\n');

    const { config, diagnostics } = parseGlobalDefs(text, { logger: quiet });

    expect(config.mail.emailTo).toEqual(['a@example.test']);
    expect(config.mail.routerId).toBe('lb-4');
    expect(diagnostics).toEqual([]);
  });

  it('should continue past an unknown block', () => {
    const text = ['vrrp_instance VI_1 {', '  state MASTER', '}', 'router_id lb-2'].join('\n');

    const { config, diagnostics } = parseGlobalDefs(text, { logger: quiet });

    expect(config.mail.routerId).toBe('lb-2');
    expect(diagnostics).toEqual([
      { level: 'error', directive: 'vrrp_instance', message: "Unknown keyword 'vrrp_instance'" },
    ]);
  });
});

describe('runParsePass', () => {
  it('should freeze the instance and namespace on reload', () => {
    const first = parseGlobalDefs('instance alpha\nnet_namespace blue', { logger: quiet });

    const reload = parseGlobalDefs('instance beta\nnet_namespace green\nrouter_id lb-3', {
      logger: quiet,
      previous: first.config,
    });

    expect(reload.config.control.instanceName).toBe('alpha');
    expect(reload.config.control.networkNamespace.name).toBe('blue');
    expect(reload.config.control.usePidDir).toBe(true);
    expect(reload.config.mail.routerId).toBe('lb-3');
    expect(reload.diagnostics).toEqual([]);
  });

  it('should start a reload from defaults for everything else', () => {
    const first = parseGlobalDefs('router_id lb-1\nvrrp_version 3', { logger: quiet });

    const reload = parseGlobalDefs('', { logger: quiet, previous: first.config });

    expect(reload.config.mail.routerId).toBeUndefined();
    expect(reload.config.vrrp.version).toBe(2);
    expect(reload.config.control.usePidDir).toBe(false);
  });

  it('should read blocks inline when given plain token lines', () => {
    const { config } = runParsePass(
      [TokenLine.of('notification_email', '{', 'a@example.test', '}')],
      { logger: quiet }
    );

    expect(config.mail.emailTo).toEqual(['a@example.test']);
  });

  it('should leave out directives of disabled features', () => {
    const settings = getDefaultSettings();
    settings.features.vrrp = false;

    const { config, diagnostics } = runParsePass([TokenLine.of('vrrp_version', '3')], {
      logger: quiet,
      settings,
    });

    expect(config.vrrp.version).toBe(2);
    expect(diagnostics).toEqual([
      { level: 'error', directive: 'vrrp_version', message: "Unknown keyword 'vrrp_version'" },
    ]);
  });

  it('should clamp real-time priorities to the configured scheduler range', () => {
    const settings = getDefaultSettings();
    settings.scheduler.rt_priority_max = 50;

    const { config, diagnostics } = runParsePass([TokenLine.of('vrrp_rt_priority', '80')], {
      logger: quiet,
      settings,
    });

    expect(config.processes.vrrp.realtimePriority).toBe(50);
    expect(diagnostics).toEqual([
      {
        level: 'info',
        directive: 'vrrp_rt_priority',
        message: 'vrrp process real-time priority 80 is greater than the maximum 50 - using 50',
      },
    ]);
  });

  it('should resolve names through the settings hosts table', () => {
    const settings = getDefaultSettings();
    settings.hosts = { 'mail.example.test': '192.0.2.30' };

    const { config } = runParsePass([TokenLine.of('smtp_server', 'mail.example.test')], {
      logger: quiet,
      settings,
    });

    expect(config.mail.smtpServer).toEqual({ family: 'ipv4', address: '192.0.2.30', port: 25 });
  });

  it('should pass every diagnostic to an extra sink as it is reported', () => {
    const extra = new DiagnosticCollector();

    const { diagnostics } = runParsePass([TokenLine.of('vrrp_version', '4')], {
      logger: quiet,
      diagnostics: extra,
    });

    expect(extra.diagnostics).toEqual(diagnostics);
    expect(diagnostics).toEqual([
      { level: 'error', directive: 'vrrp_version', message: "Invalid vrrp_version '4' (expected 2 or 3)" },
    ]);
  });

  it('should log each dispatch and the completed pass at debug level', () => {
    const log = new Logger({ component: 'GlobalDefs' });
    const debug = vi.spyOn(log, 'debug').mockImplementation(() => undefined);

    runParsePass([TokenLine.of('router_id', 'lb-1'), TokenLine.of('bogus')], { logger: log });

    expect(debug.mock.calls).toEqual([
      ['directive_dispatched', { directive: 'router_id', outcome: 'handled' }],
      ['directive_dispatched', { directive: 'bogus', outcome: 'unknown' }],
      ['parse_pass_completed', { lines: 2, diagnostics: 1, reload: false }],
    ]);
  });

  it('should hand email addresses to a custom accumulator', () => {
    const add = vi.fn();

    const { config } = runParsePass(
      [TokenLine.of('notification_email', '{', 'a@example.test', 'b@example.test', '}')],
      { logger: quiet, emails: { add } }
    );

    expect(add.mock.calls).toEqual([['a@example.test'], ['b@example.test']]);
    expect(config.mail.emailTo).toEqual([]);
  });
});

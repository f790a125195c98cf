import { describe, expect, it } from 'vitest';
import { DEFAULT_FEATURES } from '../../config/defaults.js';
import { createDefaultGlobalData } from '../../global/defaults.js';
import { StaticHostResolver } from '../../validators/address.js';
import { createHandlerContext } from '../context.js';
import { DiagnosticCollector } from '../diagnostics.js';
import { buildDirectiveTable } from '../registry.js';
import { TokenLine } from '../token-line.js';

function setup() {
  const collector = new DiagnosticCollector();
  const ctx = createHandlerContext({
    data: createDefaultGlobalData(),
    diagnostics: collector,
    resolver: new StaticHostResolver({ 'mail.example.test': '192.0.2.25' }),
  });
  const table = buildDirectiveTable(DEFAULT_FEATURES);
  return {
    data: ctx.data,
    collector,
    run: (...tokens: string[]): void => {
      table.dispatch(TokenLine.of(...tokens), ctx);
    },
  };
}

describe('mail directives', () => {
  describe('string directives', () => {
    it('should copy router_id, notification_email_from and smtp_helo_name', () => {
      const { data, run, collector } = setup();

      run('router_id', 'lb-1');
      run('notification_email_from', 'alerts@example.test');
      run('smtp_helo_name', 'lb-1.example.test');

      expect(data.mail.routerId).toBe('lb-1');
      expect(data.mail.emailFrom).toBe('alerts@example.test');
      expect(data.mail.smtpHeloName).toBe('lb-1.example.test');
      expect(collector.diagnostics).toEqual([]);
    });

    it('should let a later router_id replace an earlier one', () => {
      const { data, run } = setup();

      run('router_id', 'lb-1');
      run('router_id', 'lb-2');

      expect(data.mail.routerId).toBe('lb-2');
    });

    it('should report a missing argument as information', () => {
      const { data, run, collector } = setup();

      run('router_id');

      expect(data.mail.routerId).toBeUndefined();
      expect(collector.diagnostics).toEqual([
        { level: 'info', directive: 'router_id', message: 'router_id requires a router id' },
      ]);
    });
  });

  describe('smtp_server', () => {
    it('should parse a numeric address with the default port', () => {
      const { data, run } = setup();

      run('smtp_server', '192.0.2.1');

      expect(data.mail.smtpServer).toEqual({ family: 'ipv4', address: '192.0.2.1', port: 25 });
    });

    it('should resolve a host name with an explicit port', () => {
      const { data, run } = setup();

      run('smtp_server', 'mail.example.test', '2525');

      expect(data.mail.smtpServer).toEqual({ family: 'ipv4', address: '192.0.2.25', port: 2525 });
    });

    it('should reject an out-of-range port and leave the server unset', () => {
      const { data, run, collector } = setup();

      run('smtp_server', '192.0.2.1', '0');

      expect(data.mail.smtpServer).toEqual({ family: 'unspecified' });
      expect(collector.diagnostics).toEqual([
        {
          level: 'error',
          directive: 'smtp_server',
          message: "Invalid smtp_server port '0' (expected an integer between 1 and 65535)",
        },
      ]);
    });

    it('should keep the previous server when resolution fails', () => {
      const { data, run, collector } = setup();

      run('smtp_server', '192.0.2.1');
      run('smtp_server', 'relay-2.example.test');

      expect(data.mail.smtpServer).toEqual({ family: 'ipv4', address: '192.0.2.1', port: 25 });
      expect(collector.diagnostics).toEqual([
        {
          level: 'error',
          directive: 'smtp_server',
          message: "Invalid smtp_server 'relay-2.example.test' - unable to resolve",
        },
      ]);
    });
  });

  describe('smtp_connect_timeout', () => {
    it('should store the timeout in ticks', () => {
      const { data, run } = setup();

      run('smtp_connect_timeout', '10');

      expect(data.mail.smtpConnectTimeout).toBe(10_000_000);
    });

    it.each(['0', '4295', '10s'])('should reject %s and keep the default', (token) => {
      const { data, run, collector } = setup();

      run('smtp_connect_timeout', token);

      expect(data.mail.smtpConnectTimeout).toBe(30_000_000);
      expect(collector.diagnostics).toEqual([
        {
          level: 'error',
          directive: 'smtp_connect_timeout',
          message: `Invalid smtp_connect_timeout '${token}' (expected an integer between 1 and 4294)`,
        },
      ]);
    });
  });

  describe('notification_email', () => {
    it('should add each address in order', () => {
      const { data, run, collector } = setup();

      run('notification_email', '{', 'ops@example.test', 'oncall@example.test', '}');

      expect(data.mail.emailTo).toEqual(['ops@example.test', 'oncall@example.test']);
      expect(collector.diagnostics).toEqual([]);
    });

    it.each([
      [['notification_email']],
      [['notification_email', '{', '}']],
    ])('should report an absent or empty block as information: %j', (tokens) => {
      const { data, run, collector } = setup();

      run(...tokens);

      expect(data.mail.emailTo).toEqual([]);
      expect(collector.diagnostics).toEqual([
        {
          level: 'info',
          directive: 'notification_email',
          message: 'notification_email has no addresses',
        },
      ]);
    });
  });

  describe('alert toggles', () => {
    it('should enable smtp_alert when no argument is given', () => {
      const { data, run } = setup();

      run('smtp_alert');

      expect(data.mail.smtpAlert).toBe(true);
    });

    it('should accept explicit booleans', () => {
      const { data, run } = setup();

      run('smtp_alert_vrrp', 'off');
      run('smtp_alert_checker', 'yes');
      run('no_email_faults', 'true');

      expect(data.mail.smtpAlertVrrp).toBe(false);
      expect(data.mail.smtpAlertChecker).toBe(true);
      expect(data.mail.noEmailFaults).toBe(true);
    });

    it('should reject an unrecognised boolean and leave the field unset', () => {
      const { data, run, collector } = setup();

      run('smtp_alert', 'maybe');

      expect(data.mail.smtpAlert).toBeUndefined();
      expect(collector.diagnostics).toEqual([
        {
          level: 'error',
          directive: 'smtp_alert',
          message: "Invalid smtp_alert value 'maybe' (expected true/false, on/off or yes/no)",
        },
      ]);
    });
  });
});

/**
 * Mail and alerting directives.
 *
 * @packageDocumentation
 */

import { DEFAULT_SMTP_PORT, MAX_TICK_SECONDS } from '../../global/defaults.js';
import { resolveSocketAddress } from '../../validators/address.js';
import { parseInteger, parseSecondsAsTicks } from '../../validators/numeric.js';
import type { DirectiveDefinition } from '../directive.js';
import {
  defineDirective,
  invalidIntegerMessage,
  requireArguments,
  stringDirective,
  toggleDirective,
} from '../directive.js';

const PORT_BOUNDS = { min: 1, max: 65535 } as const;
const CONNECT_TIMEOUT_BOUNDS = { min: 1, max: MAX_TICK_SECONDS } as const;

export const mailDirectives: readonly DirectiveDefinition[] = [
  stringDirective('router_id', 'a router id', (ctx, value) => {
    ctx.data.mail.routerId = value;
  }),
  stringDirective('notification_email_from', 'a sender address', (ctx, value) => {
    ctx.data.mail.emailFrom = value;
  }),
  stringDirective('smtp_helo_name', 'a HELO name', (ctx, value) => {
    ctx.data.mail.smtpHeloName = value;
  }),
  defineDirective('smtp_server', (line, ctx) => {
    if (!requireArguments(line, ctx, 1, 'a server address')) {
      return;
    }
    const host = line.at(1) ?? '';
    let port = DEFAULT_SMTP_PORT;
    const portToken = line.at(2);
    if (portToken !== undefined) {
      const parsed = parseInteger(portToken, PORT_BOUNDS);
      if (!parsed.success) {
        ctx.report('smtp_server', invalidIntegerMessage('smtp_server port', portToken, PORT_BOUNDS));
        return;
      }
      port = parsed.value;
    }
    const address = resolveSocketAddress(host, port, ctx.resolver);
    if (address === undefined) {
      ctx.report('smtp_server', `Invalid smtp_server '${host}' - unable to resolve`);
      return;
    }
    ctx.data.mail.smtpServer = address;
  }),
  defineDirective('smtp_connect_timeout', (line, ctx) => {
    if (!requireArguments(line, ctx, 1, 'a timeout in seconds')) {
      return;
    }
    const token = line.at(1) ?? '';
    const parsed = parseSecondsAsTicks(token, CONNECT_TIMEOUT_BOUNDS);
    if (!parsed.success) {
      ctx.report(
        'smtp_connect_timeout',
        invalidIntegerMessage('smtp_connect_timeout', token, CONNECT_TIMEOUT_BOUNDS)
      );
      return;
    }
    ctx.data.mail.smtpConnectTimeout = parsed.value;
  }),
  defineDirective('notification_email', (line, ctx) => {
    const entries = ctx.blocks.readValueBlock(line);
    if (entries === undefined || entries.length === 0) {
      ctx.report('notification_email', 'notification_email has no addresses', 'info');
      return;
    }
    for (const address of entries) {
      ctx.emails.add(address);
    }
  }),
  toggleDirective('smtp_alert', (ctx, enabled) => {
    ctx.data.mail.smtpAlert = enabled;
  }),
  toggleDirective(
    'smtp_alert_vrrp',
    (ctx, enabled) => {
      ctx.data.mail.smtpAlertVrrp = enabled;
    },
    { features: ['vrrp'] }
  ),
  toggleDirective(
    'smtp_alert_checker',
    (ctx, enabled) => {
      ctx.data.mail.smtpAlertChecker = enabled;
    },
    { features: ['lvs'] }
  ),
  toggleDirective(
    'no_email_faults',
    (ctx, enabled) => {
      ctx.data.mail.noEmailFaults = enabled;
    },
    { features: ['vrrp'] }
  ),
];

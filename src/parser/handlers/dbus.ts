/**
 * DBus directives.
 *
 * @packageDocumentation
 */

import type { DirectiveDefinition } from '../directive.js';
import { stringDirective, toggleDirective } from '../directive.js';

export const dbusDirectives: readonly DirectiveDefinition[] = [
  toggleDirective(
    'enable_dbus',
    (ctx, enabled) => {
      ctx.data.dbus.enabled = enabled;
    },
    { features: ['dbus'] }
  ),
  stringDirective(
    'dbus_service_name',
    'a service name',
    (ctx, value) => {
      ctx.data.dbus.serviceName = value;
    },
    { features: ['dbus'] }
  ),
];

import type { Channel } from '../types.js';
import type { Directive } from './ledger.js';

export interface RequestedRoute {
  channel: Channel;
  model: string;
}

export type Enforcement =
  | { outcome: 'route'; channel: Channel; model: string; wasDowngraded: boolean }
  | { outcome: 'refuse'; reason: 'budget-exceeded'; requestedChannel: Channel; requestedModel: string };

/**
 * Applies a budget directive to the engine's choice. `block` replaces the
 * route with a refusal; `downgrade` swaps the model and keeps the channel.
 */
export function resolveEnforcement(directive: Directive, requested: RequestedRoute): Enforcement {
  switch (directive.kind) {
    case 'block':
      return {
        outcome: 'refuse',
        reason: directive.reason,
        requestedChannel: requested.channel,
        requestedModel: requested.model,
      };
    case 'downgrade':
      return {
        outcome: 'route',
        channel: requested.channel,
        model: directive.targetModel,
        wasDowngraded: directive.targetModel !== requested.model,
      };
    case 'allow':
      return {
        outcome: 'route',
        channel: requested.channel,
        model: requested.model,
        wasDowngraded: false,
      };
  }
}

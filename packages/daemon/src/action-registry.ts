import type { ActionDescriptor } from '@decision-relay/protocol';
import { routerLog as log } from '@decision-relay/utils/logger';

export interface RegisteredAction {
  integration: string;
  descriptor: ActionDescriptor;
  registeredAt: number;
}

export interface ResolvedAction {
  integration: string;
  /** Action name as the integration registered it */
  action: string;
}

/**
 * Maps announced action names to the integration that handles them.
 * Entries outlive the announcing connection so that an execute_action for
 * a briefly offline integration is queued rather than rejected.
 */
export class ActionRegistry {
  /** integration -> action name -> registration */
  private byIntegration: Map<string, Map<string, RegisteredAction>> = new Map();
  /** action name -> owning integration (last announcement wins) */
  private owners: Map<string, string> = new Map();

  register(integration: string, actions: ActionDescriptor[], now: number = Date.now()): RegisteredAction[] {
    const mine = this.byIntegration.get(integration) ?? new Map<string, RegisteredAction>();
    const added: RegisteredAction[] = [];
    for (const descriptor of actions) {
      const previousOwner = this.owners.get(descriptor.name);
      if (previousOwner && previousOwner !== integration) {
        log.warn(`Action ${descriptor.name} moved from ${previousOwner} to ${integration}`);
        this.byIntegration.get(previousOwner)?.delete(descriptor.name);
      }
      const entry: RegisteredAction = { integration, descriptor, registeredAt: now };
      mine.set(descriptor.name, entry);
      this.owners.set(descriptor.name, integration);
      added.push(entry);
    }
    this.byIntegration.set(integration, mine);
    return added;
  }

  /**
   * Accepts "<integration>.<action>" or a bare action name.
   */
  resolveOwner(action: string): ResolvedAction | undefined {
    const dot = action.indexOf('.');
    if (dot > 0) {
      const integration = action.slice(0, dot);
      const name = action.slice(dot + 1);
      if (this.byIntegration.get(integration)?.has(name)) {
        return { integration, action: name };
      }
    }
    const owner = this.owners.get(action);
    return owner ? { integration: owner, action } : undefined;
  }

  list(integration?: string): RegisteredAction[] {
    if (integration) {
      return Array.from(this.byIntegration.get(integration)?.values() ?? []);
    }
    return Array.from(this.byIntegration.values()).flatMap(m => Array.from(m.values()));
  }

  get size(): number {
    return this.owners.size;
  }
}

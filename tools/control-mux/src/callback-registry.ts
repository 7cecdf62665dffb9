import { ConfigError } from './errors.js';
import {
  HOOK_EVENTS,
  type CanUseTool,
  type HookCallback,
  type HookConfigEntry,
  type HookEvent,
  type HookMatcher,
  type SideChannel,
} from './protocol-types.js';

export interface CallbackRegistryInit {
  canUseTool?: CanUseTool;
  hooks?: Partial<Record<HookEvent, HookMatcher[]>>;
  sideChannels?: Record<string, SideChannel>;
}

/**
 * Session-scoped table of consumer callbacks.
 *
 * Populated during session setup, then frozen: dispatch only ever reads it,
 * so no registration can race an inbound request.
 */
export class CallbackRegistry {
  private readonly hookCallbacks = new Map<string, HookCallback>();
  private readonly hookConfig: Partial<Record<HookEvent, HookConfigEntry[]>> = {};
  private readonly channels = new Map<string, SideChannel>();
  private permission: CanUseTool | undefined;
  private frozen = false;

  /** Build and freeze a registry from session options. */
  static from(init: CallbackRegistryInit): CallbackRegistry {
    const registry = new CallbackRegistry();
    if (init.canUseTool) registry.setPermissionCallback(init.canUseTool);

    // Register in canonical event order so callback ids are stable.
    for (const event of HOOK_EVENTS) {
      const matchers = init.hooks?.[event];
      if (matchers) registry.registerHooks(event, matchers);
    }

    for (const [name, channel] of Object.entries(init.sideChannels ?? {})) {
      registry.registerSideChannel(name, channel);
    }

    registry.freeze();
    return registry;
  }

  setPermissionCallback(callback: CanUseTool): void {
    this.assertMutable();
    if (this.permission) {
      throw new ConfigError('a permission callback is already registered for this session');
    }
    this.permission = callback;
  }

  /**
   * Register the matchers for one hook event. Each callback gets an id
   * `hook_<event>_<n>`, n counting every callback registered before it, and
   * its own `{ matcher, callback_id }` entry in the initialize config.
   * Returns the ids in registration order.
   */
  registerHooks(event: HookEvent, matchers: HookMatcher[]): string[] {
    this.assertMutable();
    const ids: string[] = [];
    const entries = (this.hookConfig[event] ??= []);

    for (const matcher of matchers) {
      for (const callback of matcher.hooks) {
        const id = `hook_${event}_${this.hookCallbacks.size}`;
        this.hookCallbacks.set(id, callback);
        entries.push({ matcher: matcher.matcher ?? null, callback_id: id });
        ids.push(id);
      }
    }

    return ids;
  }

  registerSideChannel(name: string, channel: SideChannel): void {
    this.assertMutable();
    if (this.channels.has(name)) {
      throw new ConfigError(`side channel already registered: ${name}`);
    }
    this.channels.set(name, channel);
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get permissionCallback(): CanUseTool | undefined {
    return this.permission;
  }

  hookCallback(callbackId: string): HookCallback | undefined {
    return this.hookCallbacks.get(callbackId);
  }

  sideChannel(name: string): SideChannel | undefined {
    return this.channels.get(name);
  }

  /** Hook configuration for the initialize request; undefined when no hooks exist. */
  initializeHooks(): Partial<Record<HookEvent, HookConfigEntry[]>> | undefined {
    return Object.keys(this.hookConfig).length > 0 ? this.hookConfig : undefined;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new ConfigError('callback registry is frozen once the session has started');
    }
  }
}

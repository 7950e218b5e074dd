import { EventBus } from './event_bus';
import { AnalyzerConfig, resolveAnalyzerConfig } from './config';

/** Millisecond wall clock; injected so tests can drive frame timing. */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export interface PluginContext {
    eventBus: EventBus;
    config: AnalyzerConfig;
    clock: Clock;
}

export interface Plugin {
    name: string;
    version: string;

    // Lifecycle methods
    init(context: PluginContext): Promise<void> | void;
    start(): Promise<void> | void;
    stop(): Promise<void> | void;
    destroy(): Promise<void> | void;
}

export interface SupervisorOptions {
    eventBus?: EventBus;
    config?: AnalyzerConfig;
    clock?: Clock;
}

// ── Lifecycle FSM ──────────────────────────────────────────────────────────────
//
//   CREATED     → initAll()    → INITIALIZED
//   INITIALIZED → startAll()   → RUNNING
//   RUNNING     → stopAll()    → STOPPED
//   STOPPED     → startAll()   → RUNNING      (restart without re-init)
//   any state   → destroyAll() → DESTROYED    (teardown always works)
//   DESTROYED   → (terminal)

export type SupervisorState = 'CREATED' | 'INITIALIZED' | 'RUNNING' | 'STOPPED' | 'DESTROYED';

/** Thrown when a PluginSupervisor lifecycle method is called in the wrong state. */
export class LifecycleGateError extends Error {
    constructor(method: string, current: SupervisorState, allowed: SupervisorState[]) {
        super(
            `[Supervisor] LIFECYCLE GATE: ${method}() requires state ${allowed.join(' or ')},` +
            ` but supervisor is in state ${current}.\n` +
            `  Correct call order: registerPlugin() → initAll() → startAll() → stopAll() → destroyAll().`
        );
        this.name = 'LifecycleGateError';
    }
}

export class PluginSupervisor {
    private plugins: Map<string, Plugin> = new Map();
    private context: PluginContext;
    private state: SupervisorState = 'CREATED';

    constructor(options: SupervisorOptions = {}) {
        this.context = {
            eventBus: options.eventBus ?? new EventBus(),
            config: options.config ?? resolveAnalyzerConfig(),
            clock: options.clock ?? systemClock,
        };
    }

    public getEventBus(): EventBus {
        return this.context.eventBus;
    }

    public getConfig(): AnalyzerConfig {
        return this.context.config;
    }

    public getState(): SupervisorState {
        return this.state;
    }

    public getPlugin(name: string): Plugin | undefined {
        return this.plugins.get(name);
    }

    public registerPlugin(plugin: Plugin): void {
        if (this.state !== 'CREATED') {
            throw new LifecycleGateError(`registerPlugin('${plugin.name}')`, this.state, ['CREATED']);
        }
        if (this.plugins.has(plugin.name)) {
            throw new Error(`[Supervisor] DUPLICATE PLUGIN: '${plugin.name}' is already registered.`);
        }
        this.plugins.set(plugin.name, plugin);
        console.log(`[Supervisor] Registered plugin: ${plugin.name} v${plugin.version}`);
    }

    public async initAll(): Promise<void> {
        if (this.state !== 'CREATED') {
            throw new LifecycleGateError('initAll', this.state, ['CREATED']);
        }
        for (const plugin of Array.from(this.plugins.values())) {
            try {
                await plugin.init(this.context);
                console.log(`[Supervisor] Initialized: ${plugin.name}`);
            } catch (error) {
                console.error(`[Supervisor] Failed to initialize plugin: ${plugin.name}`, error);
                throw error;
            }
        }
        this.state = 'INITIALIZED';
    }

    public async startAll(): Promise<void> {
        if (this.state !== 'INITIALIZED' && this.state !== 'STOPPED') {
            throw new LifecycleGateError('startAll', this.state, ['INITIALIZED', 'STOPPED']);
        }
        for (const plugin of Array.from(this.plugins.values())) {
            try {
                await plugin.start();
                console.log(`[Supervisor] Started: ${plugin.name}`);
            } catch (error) {
                console.error(`[Supervisor] Failed to start plugin: ${plugin.name}`, error);
                throw error;
            }
        }
        this.state = 'RUNNING';
    }

    public async stopAll(): Promise<void> {
        if (this.state !== 'RUNNING') {
            throw new LifecycleGateError('stopAll', this.state, ['RUNNING']);
        }
        const reversed = Array.from(this.plugins.values()).reverse();
        for (const plugin of reversed) {
            try {
                await plugin.stop();
                console.log(`[Supervisor] Stopped: ${plugin.name}`);
            } catch (error) {
                // Non-fatal: keep stopping the rest
                console.error(`[Supervisor] Failed to stop plugin: ${plugin.name}`, error);
            }
        }
        this.state = 'STOPPED';
    }

    public async destroyAll(): Promise<void> {
        if (this.state === 'DESTROYED') {
            console.warn(`[Supervisor] destroyAll() called on an already-DESTROYED supervisor; ignoring.`);
            return;
        }
        const reversed = Array.from(this.plugins.values()).reverse();
        for (const plugin of reversed) {
            try {
                await plugin.destroy();
                console.log(`[Supervisor] Destroyed: ${plugin.name}`);
            } catch (error) {
                console.error(`[Supervisor] Failed to destroy plugin: ${plugin.name}`, error);
            }
        }
        this.plugins.clear();
        this.state = 'DESTROYED';
    }
}

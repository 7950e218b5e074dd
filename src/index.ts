import { EventBus } from './kernel/event_bus';
import { AnalyzerConfig, AnalyzerConfigInput, resolveAnalyzerConfig } from './kernel/config';
import { Clock, PluginSupervisor, systemClock } from './kernel/plugin_supervisor';
import { loadAnalyzerResources, ResourceLoader } from './resources/resource_loader';
import type { Classifier } from './analysis/classifier';
import type { LandmarkExtractor } from './analysis/landmark_extractor';
import { SignAnalyzerPlugin } from './plugins/sign_analyzer_plugin';

export * from './kernel/event_bus';
export * from './kernel/config';
export * from './kernel/hand_types';
export * from './kernel/plugin_supervisor';
export * from './resources/resource_loader';
export * from './analysis/hand_assignment';
export * from './analysis/coordinate_window';
export * from './analysis/prediction_debouncer';
export * from './analysis/frame_rate_tracker';
export * from './analysis/sign_transcript';
export * from './analysis/analysis_session';
export * from './analysis/classifier';
export * from './analysis/landmark_extractor';
export * from './analysis/frame_buffer';
export * from './analysis/frame_pump';
export * from './plugins/sign_analyzer_plugin';

export interface CreateSignAnalyzerOptions {
    extractor: LandmarkExtractor;
    classifier: Classifier;
    loader: ResourceLoader;
    config?: AnalyzerConfig | AnalyzerConfigInput;
    eventBus?: EventBus;
    clock?: Clock;
}

export interface SignAnalyzerHandle {
    analyzer: SignAnalyzerPlugin;
    supervisor: PluginSupervisor;
    eventBus: EventBus;
    onText(listener: (text: string) => void): () => void;
    shutdown(): Promise<void>;
}

/**
 * Loads the static tables, wires the analyzer into a supervisor and brings it
 * to RUNNING. Resource failures reject before anything is initialized.
 */
export async function createSignAnalyzer(options: CreateSignAnalyzerOptions): Promise<SignAnalyzerHandle> {
    const config = resolveAnalyzerConfig(options.config);
    const resources = await loadAnalyzerResources(options.loader, config);

    const supervisor = new PluginSupervisor({
        eventBus: options.eventBus,
        config,
        clock: options.clock ?? systemClock,
    });
    const analyzer = new SignAnalyzerPlugin({
        extractor: options.extractor,
        classifier: options.classifier,
        resources,
    });
    supervisor.registerPlugin(analyzer);
    await supervisor.initAll();
    await supervisor.startAll();

    return {
        analyzer,
        supervisor,
        eventBus: supervisor.getEventBus(),
        onText: listener => analyzer.onText(listener),
        shutdown: () => supervisor.destroyAll(),
    };
}

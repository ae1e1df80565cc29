import { EngineConfig, EngineConfigOverrides, resolveEngineConfig } from '../config/engine-config';
import { EventLogReader } from '../events/event-log';

/**
 * Everything one computation pass reads besides the unit snapshot itself.
 */
export interface EngineContext {
     events: EventLogReader;
     config: EngineConfig;
     referenceTime: Date;
}

export function createEngineContext(params: {
     events: EventLogReader;
     referenceTime: Date;
     config?: EngineConfig;
     overrides?: EngineConfigOverrides;
}): EngineContext {
     return {
          events: params.events,
          referenceTime: params.referenceTime,
          config: resolveEngineConfig(params.overrides, params.config),
     };
}

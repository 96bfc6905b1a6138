import { useCallback, useSyncExternalStore } from "react";
import type { PipelineSimulator } from "../../core/pipeline/PipelineSimulator";
import type { PipelineSnapshot } from "../../core/tools/pipelineEvents";

/**
 * Subscribes a component to a simulator's cycle snapshots. The component
 * re-renders once per published cycle.
 */
export function usePipelineSnapshot(simulator: PipelineSimulator): PipelineSnapshot {
  const subscribe = useCallback((onStoreChange: () => void) => simulator.subscribe(() => onStoreChange()), [simulator]);
  const getSnapshot = useCallback(() => simulator.getLatestSnapshot(), [simulator]);

  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}

import { createStore } from "zustand/vanilla";
import { createJSONStorage, persist, type StateStorage } from "zustand/middleware";
import type { ClimbDetectConfig } from "../climbs.types";
import { ClimbDetectConfigSchema } from "../climbs.schemas";
import { createClimbDetectConfig, defaultClimbDetectConfig } from "../climbs.config";

export const CLIMB_CONFIG_STORAGE_KEY = "climb-config-storage";

export type ClimbConfigState = {
    config: ClimbDetectConfig;

    /** Validates the merged config; throws InvalidConfigError and keeps the old one */
    setConfig: (partial: Partial<ClimbDetectConfig>) => void;
    resetConfig: () => void;
};

function restoreConfig(persisted: unknown, fallback: ClimbDetectConfig): ClimbDetectConfig {
    if (typeof persisted !== "object" || persisted === null || !("config" in persisted)) {
        return fallback;
    }

    const parsed = ClimbDetectConfigSchema.safeParse(persisted.config);
    if (!parsed.success) {
        console.warn("[climb-config] ignoring invalid stored settings", parsed.error.issues);
        return fallback;
    }
    return createClimbDetectConfig(parsed.data);
}

/**
 * Settings store persisted to the given storage
 * (window.localStorage in the browser, an in-memory StateStorage in tests).
 */
export function createClimbConfigStore(storage: StateStorage) {
    return createStore<ClimbConfigState>()(
        persist(
            (set, get) => ({
                config: defaultClimbDetectConfig,

                setConfig: (partial) =>
                    set({
                        config: createClimbDetectConfig({ ...get().config, ...partial }),
                    }),

                resetConfig: () =>
                    set({
                        config: defaultClimbDetectConfig,
                    }),
            }),
            {
                name: CLIMB_CONFIG_STORAGE_KEY,
                storage: createJSONStorage(() => storage),
                partialize: (state) => ({ config: state.config }),
                merge: (persisted, current) => ({
                    ...current,
                    config: restoreConfig(persisted, current.config),
                }),
            }
        )
    );
}

export interface ReplacementState {
  readonly anyChanged: boolean;
  readonly touchedScriptIds: ReadonlySet<string>;
}

export interface ReplacementTracker {
  readonly state: ReplacementState;
  markChanged(): void;
  markScriptTouched(scriptId: string): void;
}

export function createReplacementTracker(): ReplacementTracker {
  let anyChanged = false;
  const touchedScriptIds = new Set<string>();

  return {
    get state(): ReplacementState {
      return { anyChanged, touchedScriptIds };
    },
    markChanged() {
      anyChanged = true;
    },
    markScriptTouched(scriptId) {
      anyChanged = true;
      touchedScriptIds.add(scriptId);
    },
  };
}

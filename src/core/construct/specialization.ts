// src/core/construct/specialization.ts
// Process-wide switch for structural specialization of types.
//
// Graph execution layers consult isSpecializationEnabled() before
// specializing a type to its observed instances. It is off while a
// restoration method runs, since the instance is only partly initialized.

let specializationEnabled = true;

export function isSpecializationEnabled(): boolean {
  return specializationEnabled;
}

/**
 * Set the switch and return its previous value.
 */
export function setSpecializationEnabled(enabled: boolean): boolean {
  const prior = specializationEnabled;
  specializationEnabled = enabled;
  return prior;
}

/**
 * Run `fn` with specialization disabled. The prior value is restored on
 * every exit path, including a throw from `fn`.
 */
export function withSpecializationDisabled<T>(fn: () => T): T {
  const prior = setSpecializationEnabled(false);
  try {
    return fn();
  } finally {
    specializationEnabled = prior;
  }
}

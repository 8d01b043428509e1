/**
 * Gives access to the current value of settings that can change while the
 * process is running (e.g. SMTP credentials that were rotated).
 */
export interface SettingsSource<T> {
  /** Returns the current settings snapshot. */
  current(): T;
}

export interface MutableSettingsSource<T> extends SettingsSource<T> {
  /** Replaces the settings. Readers get the new snapshot on their next `current()` call. */
  update(next: T): void;
}

export const isSettingsSource = <T extends object>(
  value: T | SettingsSource<T>,
): value is SettingsSource<T> =>
  'current' in value && typeof value.current === 'function';

export const createStaticSettingsSource = <T>(value: T): SettingsSource<T> => ({
  current: () => value,
});

/**
 * Creates a settings source whose value can be replaced at runtime. The
 * snapshot is copied so later changes to the passed object are not visible.
 */
export const createMutableSettingsSource = <T extends object>(
  initial: T,
): MutableSettingsSource<T> => {
  let value: T = { ...initial };
  return {
    current: () => value,
    update: (next: T) => {
      value = { ...next };
    },
  };
};

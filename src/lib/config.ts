/**
 * Runtime configuration, read from Vite env variables.
 * Every entry has a default; unset or malformed values fall back to it.
 */

export type AppConfig = {
  /** Directory suggested by the first open / save-as */
  initialDirectory?: string;
  /** Decimals shown for derived values */
  outputDecimals: number;
  /** localStorage namespace of the browser file store */
  storageKey: string;
};

export type ConfigEnv = Partial<Record<string, string | boolean | undefined>>;

export const DEFAULT_CONFIG: AppConfig = {
  outputDecimals: 2,
  storageKey: 'gridcalc.files.v1',
};

function stringVar(env: ConfigEnv, name: string): string | undefined {
  const v = env[name];
  return typeof v === 'string' && v.trim() !== '' ? v.trim() : undefined;
}

export function readConfig(env: ConfigEnv = import.meta.env): AppConfig {
  const decimalsText = stringVar(env, 'VITE_GRIDCALC_OUTPUT_DECIMALS');
  const decimals = decimalsText === undefined ? NaN : Number(decimalsText);
  // toFixed accepts 0..100
  const outputDecimals =
    Number.isInteger(decimals) && decimals >= 0 && decimals <= 100 ? decimals : DEFAULT_CONFIG.outputDecimals;

  return {
    initialDirectory: stringVar(env, 'VITE_GRIDCALC_INITIAL_DIR'),
    outputDecimals,
    storageKey: stringVar(env, 'VITE_GRIDCALC_STORAGE_KEY') ?? DEFAULT_CONFIG.storageKey,
  };
}

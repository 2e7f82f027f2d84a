import { env as envDict } from "process";
import { tmpdir } from "os";
import { DEFAULT_MASH_SETTINGS, MashSettings } from "../../../mash-settings";
import { ConfigurationError } from "./errors";

// by default we expect mash to be on the PATH and to use the OS temp folder for scratch files
// HOWEVER, it is useful to be able to override these on an execution basis (i.e. pointing at
// a specific mash build or a larger scratch disk)

export const mashBinary = envDict["MASH"] || "mash";
export const mashWork = envDict["MASHTMP"] || tmpdir();

// names of the env variables that can override the numeric run settings
const cpusEnvName = "MASH_CPUS";
const kmerSizeEnvName = "MASH_K";
const sketchSizeEnvName = "MASH_S";
const maxDistanceEnvName = "MASH_D";
const maxPValueEnvName = "MASH_V";
const maxMashDistanceEnvName = "MASH_MAX_DISTANCE";

function numberFromEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];

  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);

  if (!Number.isFinite(value))
    throw new ConfigurationError(
      `Environment variable ${name} must be a number but was '${raw}'`
    );

  return value;
}

/**
 * Build the run settings from the defaults, overlaid with any values set
 * in the environment.
 *
 * @param env the environment to read (defaults to the process environment)
 */
export function getMashSettingsFromEnv(
  env: NodeJS.ProcessEnv = envDict
): MashSettings {
  return {
    ...DEFAULT_MASH_SETTINGS,
    cpus: numberFromEnv(env, cpusEnvName, DEFAULT_MASH_SETTINGS.cpus),
    kmerSize: numberFromEnv(
      env,
      kmerSizeEnvName,
      DEFAULT_MASH_SETTINGS.kmerSize
    ),
    sketchSize: numberFromEnv(
      env,
      sketchSizeEnvName,
      DEFAULT_MASH_SETTINGS.sketchSize
    ),
    maxDistance: numberFromEnv(
      env,
      maxDistanceEnvName,
      DEFAULT_MASH_SETTINGS.maxDistance
    ),
    maxPValue: numberFromEnv(
      env,
      maxPValueEnvName,
      DEFAULT_MASH_SETTINGS.maxPValue
    ),
    maxMashDistance: numberFromEnv(
      env,
      maxMashDistanceEnvName,
      DEFAULT_MASH_SETTINGS.maxMashDistance
    ),
  };
}

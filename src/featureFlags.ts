export type RuntimeFeatureFlags = {
  trackDependencies: boolean
  batchUpdates: boolean
  validateRenderTree: boolean
}

// Defaults can be toggled from the environment:
//   UI_DOC_TRACK_DEPENDENCIES=0
//   UI_DOC_BATCH_UPDATES=0
//   UI_DOC_VALIDATE_IR=1
export function getRuntimeFeatureFlags(
  overrides: Partial<RuntimeFeatureFlags> = {},
  env: Record<string, string | undefined> = process.env,
): RuntimeFeatureFlags {
  const fromEnv = (name: string, fallback: boolean) => {
    const raw = env[name]
    if (raw === undefined || raw === '') return fallback
    return raw === '1'
  }

  return {
    trackDependencies: overrides.trackDependencies ?? fromEnv('UI_DOC_TRACK_DEPENDENCIES', true),
    batchUpdates: overrides.batchUpdates ?? fromEnv('UI_DOC_BATCH_UPDATES', true),
    validateRenderTree: overrides.validateRenderTree ?? fromEnv('UI_DOC_VALIDATE_IR', false),
  }
}

import { describe, expect, it } from 'vitest'
import { getRuntimeFeatureFlags } from '../featureFlags'

describe('getRuntimeFeatureFlags', () => {
  it('defaults to tracked, batched and unvalidated', () => {
    expect(getRuntimeFeatureFlags({}, {})).toEqual({ trackDependencies: true, batchUpdates: true, validateRenderTree: false })
  })

  it('reads 1 and 0 from the environment', () => {
    expect(getRuntimeFeatureFlags({}, { UI_DOC_TRACK_DEPENDENCIES: '0', UI_DOC_VALIDATE_IR: '1', UI_DOC_BATCH_UPDATES: '' })).toEqual({
      trackDependencies: false,
      batchUpdates: true,
      validateRenderTree: true,
    })
  })

  it('lets explicit overrides win over the environment', () => {
    expect(getRuntimeFeatureFlags({ batchUpdates: true }, { UI_DOC_BATCH_UPDATES: '0' }).batchUpdates).toBe(true)
  })
})

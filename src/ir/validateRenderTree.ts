import Ajv2020 from 'ajv/dist/2020'
import addFormats from 'ajv-formats'
import type { ErrorObject, ValidateFunction } from 'ajv'

import { errorMessage } from '../log'
import type { RenderTree } from './irTypes'
import schema from './renderTreeSchema.json'

let _validate: ValidateFunction | null = null
let _initError: string | null = null

export type RenderTreeValidationResult =
  | { ok: true; value: RenderTree }
  | { ok: false; error: string; errors?: ErrorObject[] }

export function validateRenderTree(tree: RenderTree): RenderTreeValidationResult {
  if (!_validate && !_initError) {
    try {
      const ajv = new Ajv2020({ allErrors: true, strict: false })
      addFormats(ajv)
      _validate = ajv.compile(schema)
    } catch (e) {
      _initError = errorMessage(e)
    }
  }

  if (_initError || !_validate) {
    return { ok: false, error: `Validator init failed: ${_initError ?? 'unknown error'}` }
  }

  // Round-trip through JSON so the check sees exactly what a renderer would receive.
  const ok = _validate(JSON.parse(JSON.stringify(tree)))
  if (ok) return { ok: true, value: tree }

  const errs: ErrorObject[] = _validate.errors ?? []
  const brief = errs
    .slice(0, 6)
    .map((e) => `${e.instancePath || '(root)'} ${e.message || ''}`.trim())
    .join('\n')

  return {
    ok: false,
    error: brief || 'Schema validation failed',
    errors: errs,
  }
}

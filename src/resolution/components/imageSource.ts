import type { ImageSourceSpec } from '../../document/documentTypes'
import type { IRImageSource } from '../../ir/irTypes'
import { resolveText } from '../contentResolver'
import type { ResolutionContext } from '../resolutionContext'

export function resolveImageSource(spec: ImageSourceSpec | undefined, ctx: ResolutionContext): IRImageSource | null {
  if (!spec) return null
  if (spec.sfsymbol !== undefined) return { kind: 'system', name: resolveText(spec.sfsymbol, ctx) }
  if (spec.asset !== undefined) return { kind: 'asset', name: resolveText(spec.asset, ctx) }
  if (spec.url !== undefined) return { kind: 'url', url: resolveText(spec.url, ctx) }
  if (spec.activityIndicator) return { kind: 'activityIndicator' }
  return null
}

import type { LayoutResolver } from '../../registry/registry'

export const resolveSpacer: LayoutResolver<'spacer'> = ({ node }) => ({
  type: 'spacer',
  minLength: node.spacer.minLength ?? null,
  width: node.spacer.width ?? null,
  height: node.spacer.height ?? null,
})

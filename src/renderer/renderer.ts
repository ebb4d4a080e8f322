import type { RenderTree } from '../ir/irTypes'

// Anything that turns a render tree into host output: views, markup, a text dump.
export type Renderer<Output> = {
  render: (tree: RenderTree) => Output
}

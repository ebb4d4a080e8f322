import type { ActionBinding, ContainerType, FontWeight, SectionType } from '../document/documentTypes'
import type { StateObject, StateValue } from '../state/stateValue'

// Canonical render tree. Every property carries one concrete representation; `null` marks a
// property that is genuinely absent (no shadow, no binding), never "use a default".

export type IRColor = { red: number; green: number; blue: number; alpha: number }

export type IREdgeInsets = { top: number; bottom: number; leading: number; trailing: number }

export type IRHorizontalAlignment = 'leading' | 'center' | 'trailing'
export type IRVerticalAlignment = 'top' | 'center' | 'bottom'
export type IRAlignment = { horizontal: IRHorizontalAlignment; vertical: IRVerticalAlignment }

export type IRDimension = { kind: 'absolute' | 'fractional'; value: number }

export type IRFrame = {
  width: IRDimension | null
  height: IRDimension | null
  minWidth: IRDimension | null
  minHeight: IRDimension | null
  maxWidth: IRDimension | null
  maxHeight: IRDimension | null
}

export type IRShadow = { color: IRColor; radius: number; x: number; y: number }
export type IRBorder = { width: number; color: IRColor }

export type IRFont = { family: string | null; size: number; weight: FontWeight }

export type IRTextAppearance = {
  font: IRFont
  textColor: IRColor
  textAlignment: IRHorizontalAlignment
}

export type IRNodeStyle = {
  padding: IREdgeInsets
  backgroundColor: IRColor | null
  cornerRadius: number
  border: IRBorder | null
  shadow: IRShadow | null
  tintColor: IRColor | null
  frame: IRFrame
}

export type IRActionBinding = { kind: 'reference'; actionId: string } | { kind: 'inline'; definition: ActionDefinition }

// --- actions ---

export type SetStateValue = { kind: 'literal'; value: StateValue } | { kind: 'expression'; expression: string }

export type AlertButtonStyle = 'default' | 'cancel' | 'destructive'
export type AlertButton = { label: string; style: AlertButtonStyle; action: ActionBinding | null }
export type AlertMessage = { kind: 'static'; text: string } | { kind: 'template'; template: string }
export type AlertConfig = { title: string; message: AlertMessage | null; buttons: AlertButton[] }

export type NavigationPresentation = 'push' | 'present' | 'fullScreen'

export type ActionDefinition =
  | { kind: 'dismiss' }
  | { kind: 'setState'; path: string; value: SetStateValue }
  | { kind: 'toggleState'; path: string }
  | { kind: 'showAlert'; config: AlertConfig }
  | { kind: 'navigate'; destination: string; presentation: NavigationPresentation }
  // Steps stay unresolved; each one is resolved right before it runs.
  | { kind: 'sequence'; steps: ActionBinding[] }
  | { kind: 'custom'; type: string; parameters: StateObject }

export type ActionKind = ActionDefinition['kind']

// --- nodes ---

export type ContainerNode = {
  type: 'container'
  id: string | null
  layout: ContainerType
  alignment: IRAlignment
  spacing: number
  style: IRNodeStyle
  children: RenderNode[]
}

export type TextNode = {
  type: 'text'
  id: string | null
  content: string
  appearance: IRTextAppearance
  style: IRNodeStyle
}

export type IRImageSource =
  | { kind: 'system'; name: string }
  | { kind: 'asset'; name: string }
  | { kind: 'url'; url: string }
  | { kind: 'activityIndicator' }

export type ImagePlacement = 'leading' | 'trailing' | 'top' | 'bottom'
export type ButtonShape = 'capsule' | 'circle' | 'roundedSquare'

export type ButtonStateStyle = { appearance: IRTextAppearance; style: IRNodeStyle }

export type ButtonNode = {
  type: 'button'
  id: string | null
  label: string
  appearance: IRTextAppearance
  style: IRNodeStyle
  selectedStyle: ButtonStateStyle | null
  disabledStyle: ButtonStateStyle | null
  isSelected: boolean
  image: IRImageSource | null
  imagePlacement: ImagePlacement
  imageSpacing: number
  buttonShape: ButtonShape | null
  fillWidth: boolean
  onTap: IRActionBinding | null
}

export type TextFieldNode = {
  type: 'textField'
  id: string | null
  placeholder: string
  text: string
  bindingPath: string | null
  appearance: IRTextAppearance
  style: IRNodeStyle
  onValueChanged: IRActionBinding | null
}

export type ToggleNode = {
  type: 'toggle'
  id: string | null
  label: string
  isOn: boolean
  bindingPath: string | null
  appearance: IRTextAppearance
  style: IRNodeStyle
  onValueChanged: IRActionBinding | null
}

export type SliderNode = {
  type: 'slider'
  id: string | null
  value: number
  minValue: number
  maxValue: number
  bindingPath: string | null
  style: IRNodeStyle
  onValueChanged: IRActionBinding | null
}

export type ImageNode = {
  type: 'image'
  id: string | null
  source: IRImageSource
  placeholder: IRImageSource | null
  loading: IRImageSource | null
  style: IRNodeStyle
}

export type IRUnitPoint = { x: number; y: number }
export type IRGradientStop = { light: IRColor; dark: IRColor; location: number }

export type GradientNode = {
  type: 'gradient'
  id: string | null
  stops: IRGradientStop[]
  start: IRUnitPoint
  end: IRUnitPoint
  style: IRNodeStyle
}

export type IRShape =
  | { kind: 'rectangle' }
  | { kind: 'circle' }
  | { kind: 'roundedRectangle'; cornerRadius: number }
  | { kind: 'capsule' }
  | { kind: 'ellipse' }

export type ShapeNode = {
  type: 'shape'
  id: string | null
  shape: IRShape
  fillColor: IRColor
  style: IRNodeStyle
}

export type SpacerNode = {
  type: 'spacer'
  minLength: number | null
  width: number | null
  height: number | null
}

export type DividerNode = {
  type: 'divider'
  id: string | null
  color: IRColor
  thickness: number
  style: IRNodeStyle
}

export type PageIndicatorNode = {
  type: 'pageIndicator'
  id: string | null
  currentPage: number
  currentPageBinding: string | null
  pageCount: number
  dotSize: number
  dotSpacing: number
  dotColor: IRColor
  currentDotColor: IRColor
  style: IRNodeStyle
}

export type CustomNode = {
  type: 'custom'
  id: string | null
  customType: string
  properties: StateObject
  style: IRNodeStyle
}

export type IRColumns = { kind: 'fixed'; count: number } | { kind: 'adaptive'; minWidth: number }

export type IRItemDimensions = {
  width: IRDimension | null
  height: IRDimension | null
  aspectRatio: number | null
}

export type IRSectionConfig = {
  alignment: IRHorizontalAlignment
  itemSpacing: number
  lineSpacing: number
  contentInsets: IREdgeInsets
  itemDimensions: IRItemDimensions | null
  showsIndicators: boolean
  isPagingEnabled: boolean
  snapBehavior: 'none' | 'viewAligned' | 'paging'
  columns: IRColumns | null
  showsDividers: boolean
}

export type IRSection = {
  id: string | null
  layoutType: SectionType
  config: IRSectionConfig
  header: RenderNode | null
  footer: RenderNode | null
  stickyHeader: boolean
  children: RenderNode[]
}

export type SectionLayoutNode = {
  type: 'sectionLayout'
  id: string | null
  sectionSpacing: number
  sections: IRSection[]
}

export type RenderNode =
  | ContainerNode
  | SectionLayoutNode
  | TextNode
  | ButtonNode
  | TextFieldNode
  | ToggleNode
  | SliderNode
  | ImageNode
  | GradientNode
  | ShapeNode
  | SpacerNode
  | DividerNode
  | PageIndicatorNode
  | CustomNode

export type RenderNodeType = RenderNode['type']

export type IREdgeInset = { positioning: 'safeArea' | 'absolute'; value: number }

export type RootNode = {
  type: 'root'
  backgroundColor: IRColor
  edgeInsets: {
    top: IREdgeInset | null
    bottom: IREdgeInset | null
    leading: IREdgeInset | null
    trailing: IREdgeInset | null
  }
  colorScheme: 'light' | 'dark' | 'system'
  style: IRNodeStyle
  onAppear: IRActionBinding | null
  onDisappear: IRActionBinding | null
  children: RenderNode[]
}

export type RenderTree = {
  irVersion: string
  documentId: string
  root: RootNode
  actions: Record<string, ActionDefinition>
}

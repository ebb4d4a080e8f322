import { z } from 'zod'
import type { StateValue } from '../state/stateValue'
import { CURRENT_DOCUMENT_VERSION, formatVersion } from './documentVersion'

// Wire model for UI documents (v0.1). The host validates and interprets this; no code runs from it.

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export type ValidationErrorKind =
  | 'missingField'
  | 'typeMismatch'
  | 'invalidEnumValue'
  | 'mutuallyExclusive'
  | 'outOfRange'
  | 'invalidFormat'
  | 'unsupportedVersion'

export function addIssue(ctx: z.RefinementCtx, kind: ValidationErrorKind, message: string, path: (string | number)[] = []) {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message, path, params: { kind } })
}

export const StateValueSchema: Schema<StateValue> = z.lazy(() =>
  z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(StateValueSchema), z.record(StateValueSchema)]),
)

export const HORIZONTAL_ALIGNMENTS = ['leading', 'center', 'trailing'] as const
export const VERTICAL_ALIGNMENTS = ['top', 'center', 'bottom'] as const

export const HorizontalAlignmentSchema = z.enum(HORIZONTAL_ALIGNMENTS)
export const VerticalAlignmentSchema = z.enum(VERTICAL_ALIGNMENTS)
export type HorizontalAlignmentName = z.infer<typeof HorizontalAlignmentSchema>
export type VerticalAlignmentName = z.infer<typeof VerticalAlignmentSchema>

// A shortcut string ("topLeading", "center", ...) or a per-axis object.
export const AlignmentSchema = z.union([
  z.string().min(1),
  z.object({
    horizontal: HorizontalAlignmentSchema.optional(),
    vertical: VerticalAlignmentSchema.optional(),
  }),
])
export type AlignmentValue = z.infer<typeof AlignmentSchema>

export const PaddingSchema = z.object({
  top: z.number().optional(),
  bottom: z.number().optional(),
  leading: z.number().optional(),
  trailing: z.number().optional(),
  horizontal: z.number().optional(),
  vertical: z.number().optional(),
  all: z.number().optional(),
})
export type Padding = z.infer<typeof PaddingSchema>

export const DimensionValueSchema = z.union([
  z.number(),
  z
    .object({
      absolute: z.number().min(0).optional(),
      fractional: z.number().min(0).max(1).optional(),
    })
    .superRefine((d, ctx) => {
      if (d.absolute !== undefined && d.fractional !== undefined) {
        addIssue(ctx, 'mutuallyExclusive', "'absolute' and 'fractional' are mutually exclusive")
      } else if (d.absolute === undefined && d.fractional === undefined) {
        addIssue(ctx, 'missingField', "Expected 'absolute' or 'fractional'", ['absolute'])
      }
    }),
])
export type DimensionValue = z.infer<typeof DimensionValueSchema>

export const ShadowSchema = z.object({
  color: z.string().optional(),
  radius: z.number().min(0).optional(),
  x: z.number().optional(),
  y: z.number().optional(),
})
export type ShadowSpec = z.infer<typeof ShadowSchema>

export const FontWeightSchema = z.enum(['ultraLight', 'thin', 'light', 'regular', 'medium', 'semibold', 'bold', 'heavy', 'black'])
export type FontWeight = z.infer<typeof FontWeightSchema>

export const StyleSchema = z.object({
  inherits: z.string().min(1).optional(),
  fontFamily: z.string().optional(),
  fontSize: z.number().positive().optional(),
  fontWeight: FontWeightSchema.optional(),
  textColor: z.string().optional(),
  textAlignment: HorizontalAlignmentSchema.optional(),
  backgroundColor: z.string().optional(),
  cornerRadius: z.number().min(0).optional(),
  borderWidth: z.number().min(0).optional(),
  borderColor: z.string().optional(),
  shadow: ShadowSchema.optional(),
  tintColor: z.string().optional(),
  width: DimensionValueSchema.optional(),
  height: DimensionValueSchema.optional(),
  minWidth: DimensionValueSchema.optional(),
  minHeight: DimensionValueSchema.optional(),
  maxWidth: DimensionValueSchema.optional(),
  maxHeight: DimensionValueSchema.optional(),
  padding: PaddingSchema.optional(),
})
export type Style = z.infer<typeof StyleSchema>

export type DocumentAction = { type: string; [key: string]: StateValue }

// `{ type, ...parameters }`; parameters stay loosely typed until action resolution.
export const DocumentActionSchema: Schema<DocumentAction> = z.object({ type: z.string().min(1) }).catchall(StateValueSchema)

// Reference to a document action id, or an inline action.
export const ActionBindingSchema = z.union([z.string().min(1), DocumentActionSchema])
export type ActionBinding = z.infer<typeof ActionBindingSchema>

const DataReferenceBaseSchema = z.object({
  type: z.enum(['static', 'binding']),
  value: z.string().optional(),
  path: z.string().min(1).optional(),
  template: z.string().optional(),
})

function checkDataReference(ref: z.infer<typeof DataReferenceBaseSchema>, ctx: z.RefinementCtx) {
  if (ref.type !== 'binding') return
  if (ref.path !== undefined && ref.template !== undefined) {
    addIssue(ctx, 'mutuallyExclusive', "'path' and 'template' are mutually exclusive")
  } else if (ref.path === undefined && ref.template === undefined) {
    addIssue(ctx, 'missingField', "A binding needs 'path' or 'template'", ['path'])
  }
}

export const DataReferenceSchema = DataReferenceBaseSchema.superRefine(checkDataReference)
export type DataReference = z.infer<typeof DataReferenceSchema>

export const DataSourceSchema = DataReferenceBaseSchema.superRefine(checkDataReference)
export type DataSource = z.infer<typeof DataSourceSchema>

const IMAGE_SOURCES = ['sfsymbol', 'asset', 'url', 'activityIndicator'] as const

const ImageSourceFields = z.object({
  sfsymbol: z.string().min(1).optional(),
  asset: z.string().min(1).optional(),
  url: z.string().url().optional(),
  activityIndicator: z.boolean().optional(),
})

function checkSingleImageSource(img: z.infer<typeof ImageSourceFields>, ctx: z.RefinementCtx) {
  const set = IMAGE_SOURCES.filter((k) => img[k] !== undefined && img[k] !== false)
  if (set.length > 1) addIssue(ctx, 'mutuallyExclusive', `Image sources are mutually exclusive: ${set.join(', ')}`)
}

export const ImageSourceSchema = ImageSourceFields.superRefine(checkSingleImageSource)
export type ImageSourceSpec = z.infer<typeof ImageSourceSchema>

export const ImageSpecSchema = ImageSourceFields.extend({
  placeholder: ImageSourceSchema.optional(),
  loading: ImageSourceSchema.optional(),
}).superRefine(checkSingleImageSource)
export type ImageSpec = z.infer<typeof ImageSpecSchema>

export const GradientColorSchema = z
  .object({
    color: z.string().optional(),
    lightColor: z.string().optional(),
    darkColor: z.string().optional(),
    location: z.number().min(0).max(1).optional(),
  })
  .superRefine((stop, ctx) => {
    const adaptive = stop.lightColor !== undefined || stop.darkColor !== undefined
    if (stop.color !== undefined && adaptive) {
      addIssue(ctx, 'mutuallyExclusive', "'color' and 'lightColor'/'darkColor' are mutually exclusive")
    } else if (stop.color === undefined && (stop.lightColor === undefined || stop.darkColor === undefined)) {
      addIssue(ctx, 'missingField', "A gradient stop needs 'color' or both 'lightColor' and 'darkColor'", ['color'])
    }
  })
export type GradientColorSpec = z.infer<typeof GradientColorSchema>

export const SHAPE_TYPES = ['rectangle', 'circle', 'roundedRectangle', 'capsule', 'ellipse'] as const

export const ComponentSchema = z
  .object({
    type: z.string().min(1),
    id: z.string().optional(),
    styleId: z.string().optional(),
    style: StyleSchema.optional(),
    styles: z
      .object({
        normal: z.string().optional(),
        selected: z.string().optional(),
        disabled: z.string().optional(),
      })
      .optional(),
    padding: PaddingSchema.optional(),
    isSelectedBinding: z.string().optional(),
    dataSourceId: z.string().optional(),
    text: z.string().optional(),
    placeholder: z.string().optional(),
    bind: z.string().min(1).optional(),
    fillWidth: z.boolean().optional(),
    actions: z
      .object({
        onTap: ActionBindingSchema.optional(),
        onValueChanged: ActionBindingSchema.optional(),
      })
      .optional(),
    data: z.record(DataReferenceSchema).optional(),
    minValue: z.number().optional(),
    maxValue: z.number().optional(),
    image: ImageSpecSchema.optional(),
    imagePlacement: z.enum(['leading', 'trailing', 'top', 'bottom']).optional(),
    imageSpacing: z.number().min(0).optional(),
    buttonShape: z.enum(['capsule', 'circle', 'roundedSquare']).optional(),
    shapeType: z.enum(SHAPE_TYPES).optional(),
    cornerRadius: z.number().min(0).optional(),
    gradientColors: z.array(GradientColorSchema).optional(),
    gradientStart: z.string().optional(),
    gradientEnd: z.string().optional(),
    currentPage: z.union([z.number().int().min(0), z.string().min(1)]).optional(),
    pageCount: z.number().int().min(0).optional(),
    dotSize: z.number().min(0).optional(),
    dotSpacing: z.number().min(0).optional(),
    dotColor: z.string().optional(),
    currentDotColor: z.string().optional(),
  })
  .passthrough()
  .superRefine((c, ctx) => {
    if (c.minValue !== undefined && c.maxValue !== undefined && c.minValue > c.maxValue) {
      addIssue(ctx, 'outOfRange', `minValue (${c.minValue}) exceeds maxValue (${c.maxValue})`, ['minValue'])
    }
    if (c.text !== undefined && c.dataSourceId !== undefined) {
      addIssue(ctx, 'mutuallyExclusive', "'text' and 'dataSourceId' are mutually exclusive")
    }
    if (c.type === 'shape' && c.shapeType === undefined) {
      addIssue(ctx, 'missingField', "Shape components need 'shapeType'", ['shapeType'])
    }
  })
export type Component = z.infer<typeof ComponentSchema>

export const CONTAINER_TYPES = ['vstack', 'hstack', 'zstack'] as const
export const ContainerTypeSchema = z.enum(CONTAINER_TYPES)
export type ContainerType = z.infer<typeof ContainerTypeSchema>

export type Layout = {
  type: ContainerType
  id?: string
  alignment?: AlignmentValue
  spacing?: number
  padding?: Padding
  styleId?: string
  style?: Style
  children: LayoutNode[]
}

export type ForEach = {
  type: 'forEach'
  id?: string
  items: string
  itemVariable: string
  indexVariable: string
  layout: ContainerType
  spacing?: number
  alignment?: AlignmentValue
  padding?: Padding
  template: LayoutNode
  emptyView?: LayoutNode
}

export type Spacer = {
  type: 'spacer'
  minLength?: number
  width?: number
  height?: number
}

export const SECTION_TYPES = ['horizontal', 'list', 'grid', 'flow'] as const
export const SectionTypeSchema = z.enum(SECTION_TYPES)
export type SectionType = z.infer<typeof SectionTypeSchema>

export const ColumnConfigSchema = z.union([
  z.number().int().min(1),
  z.object({ adaptive: z.object({ minWidth: z.number().positive() }) }),
])
export type ColumnConfig = z.infer<typeof ColumnConfigSchema>

export const SectionLayoutConfigSchema = z.object({
  type: SectionTypeSchema,
  alignment: HorizontalAlignmentSchema.optional(),
  itemSpacing: z.number().min(0).optional(),
  lineSpacing: z.number().min(0).optional(),
  contentInsets: PaddingSchema.optional(),
  itemDimensions: z
    .object({
      width: DimensionValueSchema.optional(),
      height: DimensionValueSchema.optional(),
      aspectRatio: z.number().positive().optional(),
    })
    .optional(),
  showsIndicators: z.boolean().optional(),
  isPagingEnabled: z.boolean().optional(),
  snapBehavior: z.enum(['none', 'viewAligned', 'paging']).optional(),
  columns: ColumnConfigSchema.optional(),
  showsDividers: z.boolean().optional(),
})
export type SectionLayoutConfig = z.infer<typeof SectionLayoutConfigSchema>

export type SectionDefinition = {
  id?: string
  layout: SectionLayoutConfig
  header?: LayoutNode
  footer?: LayoutNode
  stickyHeader?: boolean
  children?: LayoutNode[]
  dataSource?: string
  itemTemplate?: LayoutNode
  itemVariable: string
  indexVariable: string
}

export type SectionLayout = {
  type: 'sectionLayout'
  id?: string
  sectionSpacing?: number
  sections: SectionDefinition[]
}

// Parsed layout nodes carry an explicit tag; on the wire the `type` field alone decides.
export type LayoutNode =
  | { kind: 'layout'; layout: Layout }
  | { kind: 'forEach'; forEach: ForEach }
  | { kind: 'sectionLayout'; sectionLayout: SectionLayout }
  | { kind: 'spacer'; spacer: Spacer }
  | { kind: 'component'; component: Component }

export type LayoutNodeKind = LayoutNode['kind']

function checkContainerAlignment(node: { type: ContainerType; alignment?: AlignmentValue }, ctx: z.RefinementCtx) {
  const a = node.alignment
  if (typeof a !== 'string') return
  if (node.type === 'vstack' && !HORIZONTAL_ALIGNMENTS.some((v) => v === a)) {
    addIssue(ctx, 'invalidEnumValue', `vstack alignment must be one of ${HORIZONTAL_ALIGNMENTS.join(', ')}; got '${a}'`, ['alignment'])
  }
  if (node.type === 'hstack' && !VERTICAL_ALIGNMENTS.some((v) => v === a)) {
    addIssue(ctx, 'invalidEnumValue', `hstack alignment must be one of ${VERTICAL_ALIGNMENTS.join(', ')}; got '${a}'`, ['alignment'])
  }
}

export const LayoutSchema: Schema<Layout> = z.lazy(() =>
  z
    .object({
      type: ContainerTypeSchema,
      id: z.string().optional(),
      alignment: AlignmentSchema.optional(),
      spacing: z.number().min(0).optional(),
      padding: PaddingSchema.optional(),
      styleId: z.string().optional(),
      style: StyleSchema.optional(),
      children: z.array(LayoutNodeSchema).default([]),
    })
    .superRefine(checkContainerAlignment),
)

export const ForEachSchema: Schema<ForEach> = z.lazy(() =>
  z
    .object({
      type: z.literal('forEach'),
      id: z.string().optional(),
      items: z.string().min(1),
      itemVariable: z.string().min(1).default('item'),
      indexVariable: z.string().min(1).default('index'),
      layout: ContainerTypeSchema.default('vstack'),
      spacing: z.number().min(0).optional(),
      alignment: AlignmentSchema.optional(),
      padding: PaddingSchema.optional(),
      template: LayoutNodeSchema,
      emptyView: LayoutNodeSchema.optional(),
    })
    .superRefine((f, ctx) => {
      if (f.itemVariable === f.indexVariable) {
        addIssue(ctx, 'mutuallyExclusive', `itemVariable and indexVariable must differ ('${f.itemVariable}')`, ['indexVariable'])
      }
      checkContainerAlignment({ type: f.layout, alignment: f.alignment }, ctx)
    }),
)

export const SpacerSchema: Schema<Spacer> = z.object({
  type: z.literal('spacer'),
  minLength: z.number().min(0).optional(),
  width: z.number().min(0).optional(),
  height: z.number().min(0).optional(),
})

export const SectionDefinitionSchema: Schema<SectionDefinition> = z.lazy(() =>
  z
    .object({
      id: z.string().optional(),
      layout: SectionLayoutConfigSchema,
      header: LayoutNodeSchema.optional(),
      footer: LayoutNodeSchema.optional(),
      stickyHeader: z.boolean().optional(),
      children: z.array(LayoutNodeSchema).optional(),
      dataSource: z.string().min(1).optional(),
      itemTemplate: LayoutNodeSchema.optional(),
      itemVariable: z.string().min(1).default('item'),
      indexVariable: z.string().min(1).default('index'),
    })
    .superRefine((s, ctx) => {
      if (s.dataSource !== undefined && s.children !== undefined) {
        addIssue(ctx, 'mutuallyExclusive', "'children' and 'dataSource' are mutually exclusive")
      }
      if (s.dataSource !== undefined && s.itemTemplate === undefined) {
        addIssue(ctx, 'missingField', "A data-driven section needs 'itemTemplate'", ['itemTemplate'])
      }
    }),
)

export const SectionLayoutSchema: Schema<SectionLayout> = z.lazy(() =>
  z.object({
    type: z.literal('sectionLayout'),
    id: z.string().optional(),
    sectionSpacing: z.number().min(0).optional(),
    sections: z.array(SectionDefinitionSchema),
  }),
)

function adopt<T>(result: z.SafeParseReturnType<unknown, T>, ctx: z.RefinementCtx): T {
  if (result.success) return result.data
  for (const issue of result.error.issues) ctx.addIssue(issue)
  return z.NEVER
}

export const LayoutNodeSchema: Schema<LayoutNode> = z.lazy(() =>
  z
    .object({ type: z.string().min(1) })
    .passthrough()
    .transform((raw, ctx): LayoutNode => {
      switch (raw.type) {
        case 'vstack':
        case 'hstack':
        case 'zstack':
          return { kind: 'layout', layout: adopt(LayoutSchema.safeParse(raw), ctx) }
        case 'forEach':
          return { kind: 'forEach', forEach: adopt(ForEachSchema.safeParse(raw), ctx) }
        case 'sectionLayout':
          return { kind: 'sectionLayout', sectionLayout: adopt(SectionLayoutSchema.safeParse(raw), ctx) }
        case 'spacer':
          return { kind: 'spacer', spacer: adopt(SpacerSchema.safeParse(raw), ctx) }
        default:
          return { kind: 'component', component: adopt(ComponentSchema.safeParse(raw), ctx) }
      }
    }),
)

export const EdgeInsetSchema = z.union([
  z.number(),
  z.object({
    positioning: z.enum(['safeArea', 'absolute']).default('safeArea'),
    value: z.number(),
  }),
])
export type EdgeInsetSpec = z.infer<typeof EdgeInsetSchema>

export const RootComponentSchema = z.object({
  backgroundColor: z.string().optional(),
  edgeInsets: z
    .object({
      top: EdgeInsetSchema.optional(),
      bottom: EdgeInsetSchema.optional(),
      leading: EdgeInsetSchema.optional(),
      trailing: EdgeInsetSchema.optional(),
    })
    .optional(),
  colorScheme: z.enum(['light', 'dark', 'system']).optional(),
  styleId: z.string().optional(),
  actions: z
    .object({
      onAppear: ActionBindingSchema.optional(),
      onDisappear: ActionBindingSchema.optional(),
    })
    .optional(),
  children: z.array(LayoutNodeSchema).default([]),
})
export type RootComponent = z.infer<typeof RootComponentSchema>

export const DocumentSchema = z.object({
  id: z.string().min(1),
  version: z
    .string()
    .regex(/^\d+\.\d+(\.\d+)?$/, 'Expected a version like major.minor[.patch]')
    .default(formatVersion(CURRENT_DOCUMENT_VERSION)),
  state: z.record(StateValueSchema).optional(),
  styles: z.record(StyleSchema).optional(),
  dataSources: z.record(DataSourceSchema).optional(),
  actions: z.record(DocumentActionSchema).optional(),
  root: RootComponentSchema,
})

export type DocumentDefinition = z.infer<typeof DocumentSchema>

export function isProbablyUiDocument(raw: unknown): boolean {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return false
  return 'id' in raw && 'root' in raw
}

import type { z } from 'zod'
import { errorMessage } from '../log'
import {
  DocumentSchema,
  type ActionBinding,
  type DocumentDefinition,
  type LayoutNode,
  type ValidationErrorKind,
} from './documentTypes'
import { checkCompatibility, CURRENT_DOCUMENT_VERSION, formatVersion, parseVersion } from './documentVersion'

export type ValidationIssue = {
  path: string
  kind: ValidationErrorKind
  message: string
}

export type ValidationWarning = {
  path: string
  message: string
}

export type DocumentValidationResult =
  | { ok: true; document: DocumentDefinition; warnings: ValidationWarning[] }
  | { ok: false; errors: ValidationIssue[]; warnings: ValidationWarning[] }

export class DocumentValidationError extends Error {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    super(`Invalid UI document:\n${formatValidationIssues(issues)}`)
    this.name = 'DocumentValidationError'
    this.issues = issues
  }
}

const KINDS: readonly ValidationErrorKind[] = [
  'missingField',
  'typeMismatch',
  'invalidEnumValue',
  'mutuallyExclusive',
  'outOfRange',
  'invalidFormat',
  'unsupportedVersion',
]

function isValidationErrorKind(v: unknown): v is ValidationErrorKind {
  return KINDS.some((k) => k === v)
}

function issueKind(issue: z.ZodIssue): ValidationErrorKind {
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined' ? 'missingField' : 'typeMismatch'
    case 'invalid_union':
    case 'invalid_union_discriminator':
      return 'typeMismatch'
    case 'invalid_enum_value':
    case 'invalid_literal':
      return 'invalidEnumValue'
    case 'too_small':
    case 'too_big':
      return 'outOfRange'
    case 'custom': {
      const kind: unknown = issue.params?.kind
      return isValidationErrorKind(kind) ? kind : 'invalidFormat'
    }
    default:
      return 'invalidFormat'
  }
}

function toValidationIssue(issue: z.ZodIssue): ValidationIssue {
  return {
    path: issue.path.length ? issue.path.join('.') : '<root>',
    kind: issueKind(issue),
    message: issue.message,
  }
}

export function formatValidationIssues(issues: Array<ValidationIssue | ValidationWarning>): string {
  return issues.map((i) => `${i.path}: ${i.message}`).join('\n')
}

export function validateDocument(raw: unknown): DocumentValidationResult {
  const parsed = DocumentSchema.safeParse(raw)
  if (!parsed.success) {
    return { ok: false, errors: parsed.error.issues.map(toValidationIssue), warnings: [] }
  }

  const document = parsed.data
  const warnings: ValidationWarning[] = []

  const version = parseVersion(document.version)
  if (!version) {
    return { ok: false, errors: [{ path: 'version', kind: 'invalidFormat', message: `Unparseable version '${document.version}'` }], warnings }
  }
  const compat = checkCompatibility(version)
  if (compat === 'incompatibleMajor') {
    return {
      ok: false,
      errors: [
        {
          path: 'version',
          kind: 'unsupportedVersion',
          message: `Document version ${document.version} is not supported (expected ${CURRENT_DOCUMENT_VERSION.major}.x)`,
        },
      ],
      warnings,
    }
  }
  if (compat === 'newerMinor') {
    warnings.push({
      path: 'version',
      message: `Document version ${document.version} is newer than ${formatVersion(CURRENT_DOCUMENT_VERSION)}; unknown fields are ignored`,
    })
  }

  warnings.push(...referenceWarnings(document))
  return { ok: true, document, warnings }
}

export function parseDocument(raw: unknown): DocumentDefinition {
  const result = validateDocument(raw)
  if (!result.ok) throw new DocumentValidationError(result.errors)
  return result.document
}

// Decodes UTF-8 JSON text and validates it in one step.
export function decodeDocument(json: string): DocumentValidationResult {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (e) {
    return { ok: false, errors: [{ path: '<root>', kind: 'invalidFormat', message: `Invalid JSON: ${errorMessage(e)}` }], warnings: [] }
  }
  return validateDocument(raw)
}

export type LayoutNodeVisitor = (node: LayoutNode, path: string) => void

export function visitLayoutNodes(node: LayoutNode, path: string, visit: LayoutNodeVisitor): void {
  visit(node, path)
  switch (node.kind) {
    case 'layout':
      node.layout.children.forEach((child, i) => visitLayoutNodes(child, `${path}.children.${i}`, visit))
      return
    case 'forEach':
      visitLayoutNodes(node.forEach.template, `${path}.template`, visit)
      if (node.forEach.emptyView) visitLayoutNodes(node.forEach.emptyView, `${path}.emptyView`, visit)
      return
    case 'sectionLayout':
      node.sectionLayout.sections.forEach((section, s) => {
        const base = `${path}.sections.${s}`
        if (section.header) visitLayoutNodes(section.header, `${base}.header`, visit)
        if (section.footer) visitLayoutNodes(section.footer, `${base}.footer`, visit)
        section.children?.forEach((child, i) => visitLayoutNodes(child, `${base}.children.${i}`, visit))
        if (section.itemTemplate) visitLayoutNodes(section.itemTemplate, `${base}.itemTemplate`, visit)
      })
      return
    case 'spacer':
    case 'component':
      return
  }
}

function referenceWarnings(document: DocumentDefinition): ValidationWarning[] {
  const warnings: ValidationWarning[] = []
  const styles = document.styles ?? {}
  const actions = document.actions ?? {}
  const dataSources = document.dataSources ?? {}

  const checkStyle = (id: string | undefined, path: string) => {
    // `@` ids belong to the host design system
    if (id === undefined || id.startsWith('@') || Object.hasOwn(styles, id)) return
    warnings.push({ path, message: `Unknown style '${id}'` })
  }
  const checkAction = (binding: ActionBinding | undefined, path: string) => {
    if (typeof binding !== 'string' || Object.hasOwn(actions, binding)) return
    warnings.push({ path, message: `Unknown action '${binding}'` })
  }

  for (const [id, style] of Object.entries(styles)) checkStyle(style.inherits, `styles.${id}.inherits`)
  checkStyle(document.root.styleId, 'root.styleId')
  checkAction(document.root.actions?.onAppear, 'root.actions.onAppear')
  checkAction(document.root.actions?.onDisappear, 'root.actions.onDisappear')

  for (const [id, action] of Object.entries(actions)) {
    const steps = action.type === 'sequence' ? action.steps : undefined
    if (!Array.isArray(steps)) continue
    steps.forEach((step, i) => {
      if (typeof step === 'string') checkAction(step, `actions.${id}.steps.${i}`)
    })
  }

  document.root.children.forEach((child, i) =>
    visitLayoutNodes(child, `root.children.${i}`, (node, path) => {
      if (node.kind === 'layout') checkStyle(node.layout.styleId, `${path}.styleId`)
      if (node.kind !== 'component') return
      const c = node.component
      checkStyle(c.styleId, `${path}.styleId`)
      checkStyle(c.styles?.normal, `${path}.styles.normal`)
      checkStyle(c.styles?.selected, `${path}.styles.selected`)
      checkStyle(c.styles?.disabled, `${path}.styles.disabled`)
      checkAction(c.actions?.onTap, `${path}.actions.onTap`)
      checkAction(c.actions?.onValueChanged, `${path}.actions.onValueChanged`)
      if (c.dataSourceId !== undefined && !Object.hasOwn(dataSources, c.dataSourceId)) {
        warnings.push({ path: `${path}.dataSourceId`, message: `Unknown data source '${c.dataSourceId}'` })
      }
    }),
  )

  return warnings
}

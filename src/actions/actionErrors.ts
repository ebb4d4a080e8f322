export type ActionResolutionErrorKind = 'noResolverFound' | 'invalidParameters' | 'resolutionFailed'

export class ActionResolutionError extends Error {
  readonly kind: ActionResolutionErrorKind
  readonly actionType: string

  constructor(kind: ActionResolutionErrorKind, actionType: string, message: string) {
    super(message)
    this.name = 'ActionResolutionError'
    this.kind = kind
    this.actionType = actionType
  }
}

export type ActionExecutionErrorKind = 'missingParameter' | 'invalidParameterType' | 'executionFailed'

export class ActionExecutionError extends Error {
  readonly kind: ActionExecutionErrorKind

  constructor(kind: ActionExecutionErrorKind, message: string) {
    super(message)
    this.name = 'ActionExecutionError'
    this.kind = kind
  }
}

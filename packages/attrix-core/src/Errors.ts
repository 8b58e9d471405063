// Errors 模块：
// - ValidationError / AttributeMissing 是仅有的两类对外可见错误，均为同步、即时失败；
// - RecursionGuardViolation 表示拦截器自我递归，属于缺陷而不是可恢复的运行时条件。

export interface ValidationError extends Error {
  readonly _tag: 'ValidationError'
  readonly field: string
  readonly reason: string
}

export interface AttributeMissing extends Error {
  readonly _tag: 'AttributeMissing'
  readonly recordType: string
  readonly name: string
}

export interface RecursionGuardViolation extends Error {
  readonly _tag: 'RecursionGuardViolation'
  readonly recordType: string
  readonly name: string
  readonly access: 'read' | 'write'
}

export type AttributeError = ValidationError | AttributeMissing

export const validationError = (field: string, reason: string): ValidationError =>
  Object.assign(new Error(`[Field.write] "${field}" rejected: ${reason}`), {
    _tag: 'ValidationError' as const,
    field,
    reason,
  })

export const attributeMissing = (recordType: string, name: string): AttributeMissing =>
  Object.assign(new Error(`[Record.read] "${recordType}" has no attribute "${name}"`), {
    _tag: 'AttributeMissing' as const,
    recordType,
    name,
  })

export const recursionGuardViolation = (
  recordType: string,
  name: string,
  access: 'read' | 'write',
): RecursionGuardViolation =>
  Object.assign(
    new Error(
      `[Record.${access}] "${recordType}.${name}" re-entered its own intercepted ${access}.\n` +
        'Fix: inside interceptors and binders, use the RawAccess passed in the context instead of the record.',
    ),
    {
      _tag: 'RecursionGuardViolation' as const,
      recordType,
      name,
      access,
    },
  )

const hasTag = (value: unknown, tag: string): boolean =>
  value instanceof Error && '_tag' in value && value._tag === tag

export const isValidationError = (value: unknown): value is ValidationError => hasTag(value, 'ValidationError')

export const isAttributeMissing = (value: unknown): value is AttributeMissing => hasTag(value, 'AttributeMissing')

export const isRecursionGuardViolation = (value: unknown): value is RecursionGuardViolation =>
  hasTag(value, 'RecursionGuardViolation')

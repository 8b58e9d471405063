import { describe, it, expect } from 'vitest'
import { Either, Schema } from 'effect'
import * as Attrix from '../src/index.js'

const Blank = Attrix.Record.make('Blank', { fields: {} })

describe('Field (validated descriptor)', () => {
  it('keeps per-record values apart and falls back to the default', () => {
    const Exam = Attrix.Record.make('Exam', {
      fields: { grade: Attrix.Field.range(0, 100, { default: 0 }) },
    })

    const first = Exam.make()
    first.write('grade', 95)
    expect(first.read('grade')).toBe(95)

    expect(() => first.write('grade', 150)).toThrowError('[Field.write] "grade" rejected: must be between 0 and 100')
    expect(first.read('grade')).toBe(95)

    const second = Exam.make()
    expect(second.read('grade')).toBe(0)
  })

  it('isolates records that share one descriptor', () => {
    const grade = Attrix.Field.range(0, 100)
    const a = Blank.make()
    const b = Blank.make()

    expect(Either.isRight(grade.write(a, 82))).toBe(true)
    expect(Either.isRight(grade.write(b, 75))).toBe(true)

    expect(grade.read(a)).toBe(82)
    expect(grade.read(b)).toBe(75)
    expect(grade.has(a)).toBe(true)
    expect(grade.has(Blank.make())).toBe(false)
  })

  it('rejects atomically and deterministically', () => {
    const grade = Attrix.Field.range(0, 100, { label: 'writingGrade' })
    const record = Blank.make()

    const first = grade.write(record, 150)
    const second = grade.write(record, 150)

    expect(Either.isLeft(first)).toBe(true)
    if (Either.isLeft(first) && Either.isLeft(second)) {
      expect(first.left._tag).toBe('ValidationError')
      expect(first.left.field).toBe('writingGrade')
      expect(first.left.reason).toBe('must be between 0 and 100')
      expect(second.left.reason).toBe(first.left.reason)
    }
    expect(grade.has(record)).toBe(false)
    expect(grade.read(record)).toBe(0)
  })

  it('never touches sibling fields', () => {
    const Exam = Attrix.Record.make('Exam', {
      fields: {
        mathGrade: Attrix.Field.range(0, 100),
        writingGrade: Attrix.Field.range(0, 100),
      },
    })

    const exam = Exam.make({ values: { mathGrade: 60, writingGrade: 40 } })
    exam.write('writingGrade', 82)

    expect(exam.read('mathGrade')).toBe(60)
    expect(exam.read('writingGrade')).toBe(82)
    expect(Exam.fields.mathGrade.read(exam)).toBe(60)
  })

  it('stores the decoded value of a Schema field', () => {
    const count = Attrix.Field.fromSchema(Schema.NumberFromString, { default: 0, label: 'count' })
    const record = Blank.make()

    expect(Either.isRight(count.write(record, '42'))).toBe(true)
    expect(count.read(record)).toBe(42)

    const rejected = count.write(record, 42)
    expect(Either.isLeft(rejected)).toBe(true)
    if (Either.isLeft(rejected)) {
      expect(rejected.left.field).toBe('count')
      expect(rejected.left.reason.length).toBeGreaterThan(0)
    }
    expect(count.read(record)).toBe(42)
  })

  it('validates refinements with the given reason', () => {
    const title = Attrix.Field.refine((value): value is string => typeof value === 'string' && value.length > 0, {
      default: 'untitled',
      reason: 'must be a non-empty string',
    })
    const record = Blank.make()

    expect(title.read(record)).toBe('untitled')
    const result = title.write(record, '')
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.reason).toBe('must be a non-empty string')
    }
  })

  it('learns its name from the first installation', () => {
    const grade = Attrix.Field.range(0, 100)
    expect(grade.label()).toBe('<unbound>')

    Attrix.Record.make('Homework', { fields: { grade } })
    Attrix.Record.make('Quiz', { fields: { score: grade } })

    expect(grade.label()).toBe('grade')
  })

  it('refuses one field instance under two names of a type', () => {
    const shared = Attrix.Field.range(0, 100)

    expect(() => Attrix.Record.make('Exam', { fields: { mathGrade: shared, writingGrade: shared } })).toThrowError(
      'installs the same field under "mathGrade" and "writingGrade"',
    )
  })

  it('refuses the reserved backing name', () => {
    expect(() =>
      Attrix.Record.make('Exam', { fields: { __backing__: Attrix.Field.range(0, 1) } }),
    ).toThrowError('cannot declare the reserved name "__backing__"')
  })

  it('applies the same rejection at construction time', () => {
    const Exam = Attrix.Record.make('Exam', {
      fields: { grade: Attrix.Field.range(0, 100) },
    })

    expect(() => Exam.make({ values: { grade: 150 } })).toThrowError('must be between 0 and 100')
    expect(Exam.make({ values: { grade: 70 } }).read('grade')).toBe(70)
  })

  it('enumerates written declared names before store names', () => {
    const Exam = Attrix.Record.make('Exam', {
      fields: {
        mathGrade: Attrix.Field.range(0, 100),
        writingGrade: Attrix.Field.range(0, 100),
      },
    })

    const exam = Exam.make()
    expect(exam.names()).toEqual([])

    exam.write('note', 'late')
    exam.write('writingGrade', 88)

    expect(exam.names()).toEqual(['writingGrade', 'note'])
    expect(exam.snapshot()).toEqual({ note: 'late' })
  })
})

describe('Field.computed', () => {
  const positive = Number.MAX_SAFE_INTEGER

  const quota = Attrix.Field.computed<number>({
    get: (bucket) => Number(bucket.read('max_quota')) - Number(bucket.read('quota_consumed')),
    set: (bucket, amount) => {
      if (typeof amount !== 'number' || amount < 0) return Either.left('must be a non-negative number')
      const delta = Number(bucket.read('max_quota')) - amount
      if (amount === 0) {
        bucket.write('quota_consumed', 0)
        bucket.write('max_quota', 0)
      } else if (delta < 0) {
        bucket.write('max_quota', amount)
      } else {
        bucket.write('quota_consumed', Number(bucket.read('quota_consumed')) + delta)
      }
      return Either.right(undefined)
    },
  })

  const Bucket = Attrix.Record.make('Bucket', {
    fields: {
      max_quota: Attrix.Field.range(0, positive),
      quota_consumed: Attrix.Field.range(0, positive),
      quota,
    },
  })

  const fill = (bucket: Attrix.Interceptable, amount: number): void => {
    bucket.write('quota', Number(bucket.read('quota')) + amount)
  }

  const deduct = (bucket: Attrix.Interceptable, amount: number): boolean => {
    const remaining = Number(bucket.read('quota'))
    if (remaining - amount < 0) return false
    bucket.write('quota', remaining - amount)
    return true
  }

  it('reads and writes through sibling attributes', () => {
    const bucket = Bucket.make()

    fill(bucket, 100)
    expect(bucket.read('max_quota')).toBe(100)
    expect(bucket.read('quota_consumed')).toBe(0)

    expect(deduct(bucket, 99)).toBe(true)
    expect(bucket.read('quota')).toBe(1)
    expect(bucket.read('quota_consumed')).toBe(99)

    expect(deduct(bucket, 3)).toBe(false)
    expect(bucket.read('max_quota')).toBe(100)
    expect(bucket.read('quota_consumed')).toBe(99)
  })

  it('rejects what the setter rejects and keeps no state of its own', () => {
    const bucket = Bucket.make()

    expect(() => bucket.write('quota', -1)).toThrowError(
      '[Field.write] "quota" rejected: must be a non-negative number',
    )
    expect(quota.kind).toBe('computed')
    expect(quota.has(bucket)).toBe(false)

    bucket.write('quota', 10)
    expect(bucket.names()).toEqual(['max_quota'])
  })

  it('rejects writes to a read-only field', () => {
    const Exam = Attrix.Record.make('Exam', {
      fields: {
        mathGrade: Attrix.Field.range(0, 100),
        writingGrade: Attrix.Field.range(0, 100),
        average: Attrix.Field.computed<number>({
          get: (exam) => (Number(exam.read('mathGrade')) + Number(exam.read('writingGrade'))) / 2,
        }),
      },
    })
    const exam = Exam.make({ values: { mathGrade: 80, writingGrade: 90 } })

    expect(exam.read('average')).toBe(85)
    const result = exam.assign('average', 100)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.field).toBe('average')
      expect(result.left.reason).toBe('is read-only')
    }
    expect(exam.read('average')).toBe(85)
  })
})

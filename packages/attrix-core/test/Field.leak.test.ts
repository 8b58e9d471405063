import { describe, it, expect } from 'vitest'
import { setFlagsFromString } from 'node:v8'
import { runInNewContext } from 'node:vm'
import * as Attrix from '../src/index.js'

const requireGc = (): (() => void) => {
  setFlagsFromString('--expose_gc')
  const gc: unknown = runInNewContext('gc')
  if (typeof gc !== 'function') {
    throw new Error('Missing gc (v8 flag --expose_gc could not be enabled)')
  }
  return () => {
    gc()
  }
}

const writeAndForget = (type: Attrix.RecordType<Attrix.Record.Fields>, count: number): Array<WeakRef<object>> => {
  const refs: Array<WeakRef<object>> = []
  for (let i = 0; i < count; i++) {
    const record = type.make()
    record.write('grade', 50 + i)
    refs.push(new WeakRef(record))
  }
  return refs
}

describe('Field side-table lifetime', () => {
  it('releases entries of collected records and keeps live ones', async () => {
    const gc = requireGc()
    const grade = Attrix.Field.range(0, 100)
    const Exam = Attrix.Record.make('Exam', { fields: { grade } })

    const survivor = Exam.make({ values: { grade: 99 } })
    const refs = writeAndForget(Exam, 8)
    expect(grade.liveEntries()).toBe(9)

    for (let attempt = 0; attempt < 50 && grade.liveEntries() > 1; attempt++) {
      await new Promise((resolve) => setImmediate(resolve))
      gc()
    }

    expect(refs.every((ref) => ref.deref() === undefined)).toBe(true)
    expect(grade.liveEntries()).toBe(1)
    expect(survivor.read('grade')).toBe(99)
  })
})

import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { FileSink, StringSink } from '@gmlkit/gml/sink'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

describe('StringSink', () => {
  it('concatenates written chunks', () => {
    const sink = new StringSink()
    sink.write('a\n')
    sink.write('b\n')
    sink.flush()
    expect(sink.toString()).toBe('a\nb\n')
  })
})

describe('FileSink', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'gmlkit-sink-'))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('writes buffered output on flush', () => {
    const file = path.join(tempDir, 'out.gml')
    const sink = new FileSink(file)
    sink.write('graph\n')
    expect(readFileSync(file, 'utf-8')).toBe('')

    sink.flush()
    sink.close()
    expect(readFileSync(file, 'utf-8')).toBe('graph\n')
  })

  it('flushes once the buffer fills', () => {
    const file = path.join(tempDir, 'out.gml')
    const sink = new FileSink(file, 4)
    sink.write('ab')
    sink.write('cd')
    expect(readFileSync(file, 'utf-8')).toBe('abcd')
    sink.close()
  })

  it('drops unflushed output on close', () => {
    const file = path.join(tempDir, 'out.gml')
    const sink = new FileSink(file)
    sink.write('lost')
    sink.close()
    expect(readFileSync(file, 'utf-8')).toBe('')
  })

  it('fails to flush after close', () => {
    const file = path.join(tempDir, 'out.gml')
    const sink = new FileSink(file)
    sink.close()
    expect(() => sink.flush()).toThrow('is closed')
  })

  it('fails to open a path in a missing directory', () => {
    expect(() => new FileSink(path.join(tempDir, 'missing', 'out.gml'))).toThrow()
  })
})

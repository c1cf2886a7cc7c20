import assert from 'node:assert'
import test from 'node:test'
import { FakeClock, SystemClock } from '../src/time/IClock.js'

test('FakeClock starts at the given time and advances', () => {
    const clock = new FakeClock(new Date('2026-03-01T00:00:00.000Z'))
    assert.strictEqual(clock.now().toISOString(), '2026-03-01T00:00:00.000Z')
    clock.advance(24 * 60 * 60 * 1000)
    assert.strictEqual(clock.now().toISOString(), '2026-03-02T00:00:00.000Z')
})

test('FakeClock returns copies', () => {
    const clock = new FakeClock(new Date('2026-03-01T00:00:00.000Z'))
    const first = clock.now()
    first.setUTCFullYear(1999)
    assert.strictEqual(clock.now().getUTCFullYear(), 2026)
})

test('FakeClock setTime replaces the current time', () => {
    const clock = new FakeClock()
    clock.setTime(new Date('2027-07-04T10:00:00.000Z'))
    assert.strictEqual(clock.now().toISOString(), '2027-07-04T10:00:00.000Z')
})

test('SystemClock reports wall time', () => {
    const before = Date.now()
    const now = new SystemClock().now().getTime()
    assert.ok(now >= before)
})

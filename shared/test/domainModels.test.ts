import assert from 'node:assert'
import test from 'node:test'
import { err, isApiErrorEnvelope, ok } from '../src/domainModels.js'

test('api envelope helpers', () => {
    const success = ok({ value: 1 }, 'corr')
    assert.equal(success.success, true)
    assert.equal(success.correlationId, 'corr')
    assert.deepStrictEqual(success.data, { value: 1 })

    const failure = err('Bad', 'Something broke')
    assert.equal(failure.success, false)
    assert.equal(failure.error.code, 'Bad')
    assert.equal(failure.error.message, 'Something broke')
    assert.equal(failure.correlationId, undefined)
})

test('isApiErrorEnvelope discriminates envelopes', () => {
    assert.equal(isApiErrorEnvelope(ok('x')), false)
    assert.equal(isApiErrorEnvelope(err('NotFound', 'missing')), true)
})

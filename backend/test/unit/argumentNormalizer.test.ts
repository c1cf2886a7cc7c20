import { FakeClock, InvalidArgumentsException } from '@foundry-mcp-chat/shared'
import assert from 'node:assert'
import { describe, test } from 'node:test'
import { DEFAULT_STRIPPED_SORT_TOKENS } from '../../src/config/mcpConfig.js'
import { ArgumentNormalizer } from '../../src/mcp/argumentNormalizer.js'

function createNormalizer(recencyDays = 30): ArgumentNormalizer {
    return new ArgumentNormalizer(new FakeClock(), { recencyDays, strippedSortTokens: DEFAULT_STRIPPED_SORT_TOKENS })
}

describe('ArgumentNormalizer', () => {
    describe('parsing', () => {
        test('round-trips valid JSON objects for non-search tools', () => {
            const normalizer = createNormalizer()
            const raw = '{"owner":"octo","repo":"demo","path":"README.md","nested":{"n":[1,2,null,true]}}'
            assert.deepStrictEqual(normalizer.normalize('get_file_contents', raw), JSON.parse(raw))
        })

        test('empty or whitespace arguments become an empty object', () => {
            const normalizer = createNormalizer()
            assert.deepStrictEqual(normalizer.normalizeWithReport('list_issues', ''), { arguments: {}, repair: 'empty-arguments' })
            assert.deepStrictEqual(normalizer.normalizeWithReport('list_issues', '   \n'), { arguments: {}, repair: 'empty-arguments' })
            assert.deepStrictEqual(normalizer.normalizeWithReport('list_issues', undefined), { arguments: {}, repair: 'empty-arguments' })
        })

        test('valid JSON that is not an object passes through', () => {
            const normalizer = createNormalizer()
            assert.deepStrictEqual(normalizer.normalize('list_issues', '[1,2]'), [1, 2])
            assert.strictEqual(normalizer.normalize('list_issues', '42'), 42)
        })

        test('already parsed values are accepted', () => {
            const normalizer = createNormalizer()
            assert.deepStrictEqual(normalizer.normalize('list_issues', { owner: 'octo', repo: 'demo' }), { owner: 'octo', repo: 'demo' })
        })

        test('invalid JSON throws InvalidArgumentsException naming the tool', () => {
            const normalizer = createNormalizer()
            assert.throws(
                () => normalizer.normalize('list_issues', '{"owner":'),
                (error: unknown) =>
                    error instanceof InvalidArgumentsException &&
                    error.toolName === 'list_issues' &&
                    error.message.startsWith("Invalid JSON arguments for tool 'list_issues': ")
            )
        })

        test('parsed values that are not JSON are rejected', () => {
            const normalizer = createNormalizer()
            assert.throws(
                () => normalizer.normalize('list_issues', { when: Number.NaN }),
                /Arguments for tool 'list_issues' are not JSON serializable/
            )
        })
    })

    describe('search_repositories query repair', () => {
        test('a sort-only query is replaced by a recently-pushed qualifier', () => {
            const normalizer = createNormalizer()
            const report = normalizer.normalizeWithReport('search_repositories', '{"query":"sort:updated-desc"}')
            assert.deepStrictEqual(report, { arguments: { query: 'pushed:>=2026-01-01' }, repair: 'search-query-defaulted' })
        })

        test('sort tokens are stripped case-insensitively and the rest is rejoined', () => {
            const normalizer = createNormalizer()
            const report = normalizer.normalizeWithReport('search_repositories', '{"query":"  azure   SORT:Updated-Asc  language:ts ","per_page":5}')
            assert.deepStrictEqual(report, { arguments: { query: 'azure language:ts', per_page: 5 }, repair: 'search-sort-stripped' })
        })

        test('a query without sort tokens is left untouched', () => {
            const normalizer = createNormalizer()
            const report = normalizer.normalizeWithReport('search_repositories', '{"query":"  azure  functions "}')
            assert.deepStrictEqual(report, { arguments: { query: '  azure  functions ' }, repair: 'none' })
        })

        test('tokens that only contain a sort token are kept', () => {
            const normalizer = createNormalizer()
            assert.deepStrictEqual(normalizer.normalize('search_repositories', '{"query":"sort:updated-descending"}'), {
                query: 'sort:updated-descending'
            })
        })

        test('absent, null and blank queries are defaulted', () => {
            const normalizer = createNormalizer()
            assert.deepStrictEqual(normalizer.normalize('search_repositories', '{}'), { query: 'pushed:>=2026-01-01' })
            assert.deepStrictEqual(normalizer.normalize('search_repositories', '{"query":null}'), { query: 'pushed:>=2026-01-01' })
            assert.deepStrictEqual(normalizer.normalize('search_repositories', '{"query":"   "}'), { query: 'pushed:>=2026-01-01' })
        })

        test('empty raw arguments for search get a defaulted query', () => {
            const normalizer = createNormalizer()
            assert.deepStrictEqual(normalizer.normalizeWithReport('search_repositories', ''), {
                arguments: { query: 'pushed:>=2026-01-01' },
                repair: 'search-query-defaulted'
            })
        })

        test('a non-string query is left untouched', () => {
            const normalizer = createNormalizer()
            assert.deepStrictEqual(normalizer.normalizeWithReport('search_repositories', '{"query":7}'), {
                arguments: { query: 7 },
                repair: 'none'
            })
        })

        test('the recency window follows configuration', () => {
            const normalizer = createNormalizer(7)
            assert.deepStrictEqual(normalizer.normalize('search_repositories', '{"query":"sort:updated"}'), {
                query: 'pushed:>=2026-01-24'
            })
        })

        test('the rule applies only to search_repositories', () => {
            const normalizer = createNormalizer()
            assert.deepStrictEqual(normalizer.normalizeWithReport('list_issues', '{"query":"sort:updated"}'), {
                arguments: { query: 'sort:updated' },
                repair: 'none'
            })
        })
    })
})

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { reconcileRoster, submitDecisions } from '../src/pipeline/reconcile'
import { FakeGradebook, record, student } from './helpers'

const roster = [student(11, 'a@x.edu', 'Ada'), student(12, 'b@x.edu', 'Bo'), student(13, 'c@x.edu', 'Cy')]

describe('reconcileRoster', () => {
	it('decides every roster member, in roster order', () => {
		const decisions = reconcileRoster(roster, [record('c@x.edu'), record('a@x.edu')])
		expect(decisions.map((d) => [d.entry.loginId, d.score])).toEqual([
			['a@x.edu', 1],
			['b@x.edu', 0],
			['c@x.edu', 1],
		])
	})

	it('marks everyone absent when nothing validated', () => {
		const decisions = reconcileRoster(roster, [])
		expect(decisions).toHaveLength(3)
		expect(decisions.every((d) => d.score === 0 && d.evidence === undefined)).toBe(true)
	})

	it('ignores submissions from outside the roster', () => {
		const decisions = reconcileRoster(roster, [record('visitor@x.edu')])
		expect(decisions.map((d) => d.entry.loginId)).toEqual(['a@x.edu', 'b@x.edu', 'c@x.edu'])
		expect(decisions.filter((d) => d.score === 1)).toEqual([])
	})

	it('matches identities exactly, case included', () => {
		const decisions = reconcileRoster([student(11, 'a@x.edu')], [record('A@x.edu')])
		expect(decisions[0].score).toBe(0)
	})

	it('keeps the first matching record as evidence', () => {
		const first = record('a@x.edu', { n: 1 })
		const decisions = reconcileRoster([student(11, 'a@x.edu')], [first, record('a@x.edu', { n: 2 })])
		expect(decisions[0].evidence).toBe(first)
	})

	it('never matches a roster member without a login id', () => {
		const decisions = reconcileRoster([student(14, '')], [record('')])
		expect(decisions[0].score).toBe(0)
	})
})

describe('submitDecisions', () => {
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {})
		vi.spyOn(console, 'error').mockImplementation(() => {})
	})

	const assignment = { id: 7, name: 'Lecture 7' }

	it('submits each decision exactly once', async () => {
		const gradebook = new FakeGradebook(roster)
		const decisions = reconcileRoster(roster, [record('b@x.edu')])
		const result = await submitDecisions(gradebook, assignment, decisions)
		expect(result).toEqual({ submitted: 3, failed: [] })
		expect(gradebook.posted).toEqual([
			{ userId: 11, score: 0 },
			{ userId: 12, score: 1 },
			{ userId: 13, score: 0 },
		])
	})

	it('keeps going after a failed entry and reports it', async () => {
		const gradebook = new FakeGradebook(roster)
		gradebook.failFor.add(12)
		const result = await submitDecisions(gradebook, assignment, reconcileRoster(roster, []))
		expect(result.submitted).toBe(2)
		expect(result.failed).toEqual([{ entry: roster[1], error: 'gradebook rejected 12' }])
		expect(gradebook.posted.map((p) => p.userId)).toEqual([11, 13])
	})

	it('posts nothing on a dry run', async () => {
		const gradebook = new FakeGradebook(roster)
		const result = await submitDecisions(gradebook, assignment, reconcileRoster(roster, []), { dryRun: true })
		expect(result).toEqual({ submitted: 0, failed: [] })
		expect(gradebook.posted).toEqual([])
	})
})

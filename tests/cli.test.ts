import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { main, parseCliArgs } from '../src/cli'
import { ProviderError } from '../src/errors'
import type { QuestionSchema } from '../src/types'
import { FakeForms, FakeGradebook, student } from './helpers'

const env = {
	GOOGLE_FORM_ID: 'form-1',
	GOOGLE_ACCESS_TOKEN: 'test-google-token',
	CANVAS_API_URL: 'https://canvas.example.edu',
	CANVAS_TOKEN: 'test-canvas-token',
	CANVAS_COURSE_ID: '1001',
}

const schema: QuestionSchema = new Map([
	['q1', 'What is the Concept of the Day?'],
	['q2', 'Understanding (1-5)'],
])

describe('parseCliArgs', () => {
	it('reads every option', () => {
		expect(
			parseCliArgs([
				'--assignment-id', '55',
				'--date', '2024-10-03',
				'--keyphrase', 'graph theory',
				'--start', '09:00',
				'--end', '10:00',
				'--threshold', '80',
				'--out-dir', 'reports',
				'--dry-run',
			]),
		).toEqual({
			assignmentId: '55',
			date: '2024-10-03',
			keyphrase: 'graph theory',
			start: '09:00',
			end: '10:00',
			threshold: '80',
			outDir: 'reports',
			dryRun: true,
			help: false,
		})
	})

	it('rejects unknown options', () => {
		expect(() => parseCliArgs(['--course', '1'])).toThrow()
	})
})

describe('main', () => {
	let dir = ''

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'attendance-cli-'))
		vi.spyOn(console, 'log').mockImplementation(() => {})
		vi.spyOn(console, 'warn').mockImplementation(() => {})
		vi.spyOn(console, 'error').mockImplementation(() => {})
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	const argv = () => ['--assignment-id', '55', '--date', '2024-10-03', '--keyphrase', 'Graph Theory', '--out-dir', dir]

	it('grades, writes both files and prints who needs support', async () => {
		const forms = new FakeForms(schema, [
			{
				responseId: 'r1',
				createTime: '2024-10-03T20:05:00Z',
				lastSubmittedTime: '2024-10-03T20:05:00Z',
				respondentEmail: 'a@x.edu',
				answers_q1_textAnswers_answers_0_value: 'graph theory',
				answers_q2_textAnswers_answers_0_value: '1',
			},
		])
		const gradebook = new FakeGradebook([student(1, 'a@x.edu'), student(2, 'b@x.edu')])

		const code = await main(argv(), env, () => ({ forms, gradebook }))

		expect(code).toBe(0)
		expect(gradebook.posted).toEqual([
			{ userId: 1, score: 1 },
			{ userId: 2, score: 0 },
		])
		expect(await readFile(join(dir, '2024-10-03_report.csv'), 'utf8')).toBe('signal,mean,count,missing\nUnderstanding (1-5),1,1,0')
		expect(await readFile(join(dir, '2024-10-03_out.csv'), 'utf8')).toBe(
			[
				'responseId,createTime,lastSubmittedTime,respondentEmail,What is the Concept of the Day?,Understanding (1-5),needsAssistance',
				'r1,2024-10-03T20:05:00Z,2024-10-03T20:05:00Z,a@x.edu,graph theory,1,true',
			].join('\n'),
		)
		expect(console.log).toHaveBeenCalledWith('Students in need of support:')
		expect(console.log).toHaveBeenCalledWith('a@x.edu')
	})

	it('fails before touching any provider on bad configuration', async () => {
		const makeProviders = vi.fn()
		const code = await main(['--assignment-id', '55', '--date', '03/10/2024', '--keyphrase', 'x'], env, makeProviders)
		expect(code).toBe(1)
		expect(makeProviders).not.toHaveBeenCalled()
		expect(console.error).toHaveBeenCalledWith('[CLI]', '--date must be a YYYY-MM-DD calendar date')
	})

	it('exits non-zero when a provider fails', async () => {
		const forms = new FakeForms(schema, [])
		vi.spyOn(forms, 'fetchSchema').mockRejectedValue(new ProviderError({ provider: 'google', message: 'HTTP 401: unauthorized', status: 401 }))
		const code = await main(argv(), env, () => ({ forms, gradebook: new FakeGradebook([]) }))
		expect(code).toBe(1)
	})

	it('exits non-zero without grading when the keyphrase question is missing', async () => {
		const gradebook = new FakeGradebook([student(1, 'a@x.edu')])
		const code = await main(argv(), env, () => ({ forms: new FakeForms(new Map([['q2', 'Understanding (1-5)']]), []), gradebook }))
		expect(code).toBe(1)
		expect(gradebook.posted).toEqual([])
		expect(console.error).toHaveBeenCalledWith('[CLI]', 'keyphrase question "What is the Concept of the Day?" is not on the form')
	})

	it('still completes when single grade submissions fail', async () => {
		const gradebook = new FakeGradebook([student(1, 'a@x.edu'), student(2, 'b@x.edu')])
		gradebook.failFor.add(2)
		const code = await main(argv(), env, () => ({ forms: new FakeForms(schema, []), gradebook }))
		expect(code).toBe(0)
		expect(gradebook.posted).toEqual([{ userId: 1, score: 0 }])
	})
})

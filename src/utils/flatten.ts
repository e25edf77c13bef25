import type { FieldValue } from '../types'

/**
 * Flattens a nested JSON document into one level, joining keys with `_` and
 * array indices as keys: { answers: { q1: { textAnswers: { answers: [{ value: 'x' }] } } } }
 * becomes { answers_q1_textAnswers_answers_0_value: 'x' }.
 * Empty objects and arrays keep their key with a null value.
 */
export function flatten(doc: unknown, separator = '_'): Record<string, FieldValue> {
	const out: Record<string, FieldValue> = {}

	const walk = (value: unknown, key: string) => {
		if (value === null || value === undefined) {
			if (key) out[key] = null
			return
		}
		if (Array.isArray(value)) {
			if (!value.length) {
				if (key) out[key] = null
				return
			}
			value.forEach((item, i) => walk(item, key ? `${key}${separator}${i}` : String(i)))
			return
		}
		if (typeof value === 'object') {
			const entries = Object.entries(value)
			if (!entries.length) {
				if (key) out[key] = null
				return
			}
			for (const [k, v] of entries) walk(v, key ? `${key}${separator}${k}` : k)
			return
		}
		if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
			out[key] = value
			return
		}
		out[key] = String(value)
	}

	walk(doc, '')
	return out
}

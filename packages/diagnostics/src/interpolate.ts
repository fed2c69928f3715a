import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fill `{key}` placeholders from args. Unknown keys stay as written.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (args === undefined) return template
	return template.replace(PLACEHOLDER, (match: string, key: string) => {
		const value = args[key]
		return value === undefined ? match : String(value)
	})
}

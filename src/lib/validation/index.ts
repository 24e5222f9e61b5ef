/**
 * Validation wrapper — zod `safeParse` folded into Result<T, ValidationError>.
 *
 * Wire frames and environment values are validated at the boundary; the
 * issues list keeps the failing path so malformed frames can be logged with
 * the field that broke them.
 */

import { z } from "zod";
import { ErrorCategory, FeedError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error carrying every issue zod reported. */
export class ValidationError extends FeedError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** `path.to.field: message` for the first issue, or the error message if there is none. */
	get summary(): string {
		const first = this.issues[0];
		if (first === undefined) return this.message;
		const path = first.path.length > 0 ? first.path.join(".") : "(root)";
		return `${path}: ${first.message}`;
	}
}

/** Validate data against a zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: [...i.path],
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}

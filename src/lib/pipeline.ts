import type { Phase, StepContext, StepDef, StepId } from "../types.js";
import * as ui from "./ui.js";

/** A step that threw, tagged with where in the workflow it happened. */
export class StepError extends Error {
	readonly stepId: StepId;
	readonly phase: Phase;

	constructor(step: StepDef, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Step "${step.label}" failed: ${reason}`, { cause });
		this.name = "StepError";
		this.stepId = step.id;
		this.phase = step.phase;
	}
}

export type PipelineResult = { ok: true; completed: StepId[] } | { ok: false; completed: StepId[]; error: StepError };

/**
 * Run steps in order, stopping at the first one that throws.
 * Nothing after a failed step runs and nothing before it is undone.
 */
export async function runPipeline(steps: readonly StepDef[], ctx: StepContext): Promise<PipelineResult> {
	const completed: StepId[] = [];

	for (const [i, step] of steps.entries()) {
		ui.stepHeader(i + 1, steps.length, step.label);
		try {
			await step.run(ctx);
		} catch (err) {
			const error = new StepError(step, err);
			ui.error(error.message);
			return { ok: false, completed, error };
		}
		completed.push(step.id);
	}

	return { ok: true, completed };
}

// CHANGE: Rebuild command-line order from separately parsed objects and namespecs
// WHY: archives resolve symbols in link order, so -l placement relative to objects matters
// PURITY: CORE
// FORMAT THEOREM: ∀ a, b ∈ plan: index(a) < index(b) ↔ a.position < b.position
// INVARIANT: position 0 at a list head means "exhausted"
// COMPLEXITY: O(n + m) time / O(n + m) space

import type {
	InputItem,
	OrderedInputPlan,
	PositionedValue,
} from "../types/index.js";

const NO_POSITION = 0;

const headPosition = (
	list: ReadonlyArray<PositionedValue>,
	cursor: number,
): number => list[cursor]?.position ?? NO_POSITION;

/**
 * Picks the list whose head comes first on the command line.
 *
 * @returns "object", "namespec", or null when both heads are exhausted
 * @pure true
 */
function nextKind(
	objectPos: number,
	namePos: number,
): InputItem["kind"] | null {
	if (objectPos !== NO_POSITION && (namePos === NO_POSITION || objectPos < namePos)) {
		return "object";
	}
	if (namePos !== NO_POSITION && (objectPos === NO_POSITION || namePos < objectPos)) {
		return "namespec";
	}
	return null;
}

/**
 * Two-pointer merge of object files and namespecs by command-line position.
 *
 * @param objectFiles - Positional inputs, ascending by position
 * @param nameSpecs - `-l` values, ascending by position
 * @returns Inputs in original command-line order
 *
 * @pure true
 * @precondition positions are ≥ 1 and unique across both lists
 * @postcondition |plan| = |objectFiles| + |nameSpecs|
 * @postcondition projection of plan on either kind preserves that kind's order
 *
 * @example
 * ```ts
 * planInputs(
 *   [{ value: "a.o", position: 1 }, { value: "b.o", position: 3 }],
 *   [{ value: "m", position: 2 }],
 * );
 * // [object a.o@1, namespec m@2, object b.o@3]
 * ```
 */
export function planInputs(
	objectFiles: ReadonlyArray<PositionedValue>,
	nameSpecs: ReadonlyArray<PositionedValue>,
): OrderedInputPlan {
	const plan: InputItem[] = [];
	let fileCursor = 0;
	let nameCursor = 0;

	for (;;) {
		const file = objectFiles[fileCursor];
		const name = nameSpecs[nameCursor];
		const kind = nextKind(
			headPosition(objectFiles, fileCursor),
			headPosition(nameSpecs, nameCursor),
		);
		if (kind === "object" && file !== undefined) {
			plan.push({ kind: "object", path: file.value, position: file.position });
			fileCursor++;
		} else if (kind === "namespec" && name !== undefined) {
			plan.push({ kind: "namespec", name: name.value, position: name.position });
			nameCursor++;
		} else {
			// Both heads exhausted (or both report position 0)
			break;
		}
	}

	return plan;
}

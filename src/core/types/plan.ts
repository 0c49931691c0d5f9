// CHANGE: Tagged input items and the ordered plan the invoker walks
// PURITY: CORE
// INVARIANT: plan[i].position < plan[i + 1].position

/**
 * Object file given as a positional argument.
 */
export interface ObjectFileInput {
	readonly kind: "object";
	readonly path: string;
	readonly position: number;
}

/**
 * Library given by namespec (`-lname` or `-l:file`).
 */
export interface NameSpecInput {
	readonly kind: "namespec";
	readonly name: string;
	readonly position: number;
}

export type InputItem = ObjectFileInput | NameSpecInput;

/**
 * Inputs in command-line order.
 */
export type OrderedInputPlan = ReadonlyArray<InputItem>;

import type { FSMSymbol } from "./errors.ts";
import type { State } from "./state.ts";

const INDENT = "       ";

/**
 * Collects every state reachable from `initial`, each exactly once, in
 * depth-first discovery order (edges in registration order).
 *
 * Visited states are tracked by identity, so distinct states sharing a name
 * are both reported and cyclic graphs terminate.
 */
export function reachableStates<TSymbol extends FSMSymbol, TOutput>(
	initial: State<TSymbol, TOutput>
): State<TSymbol, TOutput>[] {
	const visited = new Set<State<TSymbol, TOutput>>();
	const stack = [initial];
	while (stack.length) {
		const state = stack.pop();
		if (!state || visited.has(state)) continue;
		visited.add(state);
		// reversed, so the first edge is explored first
		const targets = [...state.transitions.values()].map((e) => e.target);
		for (let i = targets.length - 1; i >= 0; i--) {
			if (!visited.has(targets[i])) stack.push(targets[i]);
		}
	}
	return [...visited];
}

/**
 * Renders the graph as an indented tree. Each state is expanded once, at the
 * point it is first reached; later references only show up as edge lines.
 *
 * @example
 * ```
 * p
 *   0 -> p
 *   1 -> q
 *        q
 *          0 -> q
 *          1 -> p
 * ```
 */
export function renderTree<TSymbol extends FSMSymbol, TOutput>(
	initial: State<TSymbol, TOutput>
): string {
	const lines: string[] = [];
	const visited = new Set<State<TSymbol, TOutput>>();

	const walk = (state: State<TSymbol, TOutput>, depth: number) => {
		if (visited.has(state)) return;
		visited.add(state);
		const pad = INDENT.repeat(depth);
		lines.push(pad + state.name);
		for (const [symbol, edge] of state.transitions) {
			let line = `${pad}  ${symbol} -> ${edge.target.name}`;
			if (edge.output !== undefined) line += ` [${String(edge.output)}]`;
			lines.push(line);
			walk(edge.target, depth + 1);
		}
	};

	walk(initial, 0);
	return lines.join("\n");
}

/**
 * Generates a Mermaid stateDiagram-v2 notation of the graph reachable from
 * `initial`. Edge outputs are shown as `symbol / output`, accepting states get
 * a final `--> [*]` edge.
 */
export function toMermaid<TSymbol extends FSMSymbol, TOutput>(
	initial: State<TSymbol, TOutput>
): string {
	let mermaid = "stateDiagram-v2\n";
	mermaid += `    [*] --> ${initial.name}\n`;

	for (const state of reachableStates(initial)) {
		for (const [symbol, edge] of state.transitions) {
			let label = String(symbol);
			if (edge.output !== undefined) label += ` / ${String(edge.output)}`;
			mermaid += `    ${state.name} --> ${edge.target.name}: ${label}\n`;
		}
		if (state.accepting) {
			mermaid += `    ${state.name} --> [*]\n`;
		}
	}

	return mermaid;
}

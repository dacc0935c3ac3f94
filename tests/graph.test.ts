import { expect, test } from "vitest";
import { reachableStates, renderTree, State, toMermaid } from "../src/mod.ts";

test("reachable states follow identity, not names", () => {
	const a = new State<string>("twin", { initial: true });
	const b = new State<string>("twin");
	const unreachable = new State<string>("island");
	a.addTransition("x", b);
	b.addTransition("x", a);
	unreachable.addTransition("x", a);

	expect(reachableStates(a)).toEqual([a, b]);
	expect(reachableStates(a)[1]).toBe(b);
	expect(renderTree(a)).toBe(
		["twin", "  x -> twin", "       twin", "         x -> twin"].join("\n")
	);
});

test("depth first discovery order", () => {
	const root = new State<number>("root", { initial: true });
	const left = new State<number>("left");
	const leaf = new State<number>("leaf", { accepting: true });
	const right = new State<number>("right");
	root.addTransition(0, left).addTransition(1, right);
	left.addTransition(0, leaf);
	right.addTransition(0, leaf);

	expect(reachableStates(root).map((s) => s.name)).toEqual([
		"root",
		"left",
		"leaf",
		"right",
	]);
	expect(toMermaid(root)).toBe(
		`stateDiagram-v2
    [*] --> root
    root --> left: 0
    root --> right: 1
    left --> leaf: 0
    leaf --> [*]
    right --> leaf: 0
`
	);
});

test("single state without transitions", () => {
	const alone = new State("alone", { initial: true });
	expect(reachableStates(alone)).toEqual([alone]);
	expect(renderTree(alone)).toBe("alone");
});

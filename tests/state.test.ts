import { expect, test } from "vitest";
import {
	AutomatonError,
	DuplicateTransitionError,
	State,
	UndefinedTransitionError,
} from "../src/mod.ts";

test("add and look up transitions", () => {
	const p = new State<string, string>("p", { initial: true });
	const q = new State<string, string>("q");

	expect(p.addTransition("a", q, "out")).toBe(p);
	p.addTransition("b", p);

	expect(p.transitionFor("a")).toEqual({ target: q, output: "out" });
	expect(p.transitionFor("b")).toEqual({ target: p });
	expect(p.hasTransition("a")).toBe(true);
	expect(p.hasTransition("c")).toBe(false);
	expect(p.symbols()).toEqual(["a", "b"]);
});

test("re-registering a symbol replaces the edge", () => {
	const p = new State<number>("p");
	const q = new State<number>("q");
	const r = new State<number>("r");

	p.addTransition(0, q);
	p.addTransition(0, r);

	expect(p.transitionFor(0).target).toBe(r);
	expect(p.symbols()).toEqual([0]);
});

test("strict state rejects a second edge for the same symbol", () => {
	const p = new State<string>("p", { strict: true });
	p.addTransition("a", p);

	const error = (() => {
		try {
			p.addTransition("a", new State<string>("q"));
		} catch (e) {
			return e;
		}
	})();

	expect(error).toBeInstanceOf(DuplicateTransitionError);
	expect(error).toBeInstanceOf(AutomatonError);
	expect(error).toMatchObject({ state: "p", symbol: "a" });
	expect(p.transitionFor("a").target).toBe(p);
});

test("missing transition throws UndefinedTransitionError", () => {
	const p = new State<string | number>("p");
	p.addTransition("a", p);

	expect(() => p.transitionFor(1)).toThrow(UndefinedTransitionError);
	expect(() => p.transitionFor("b")).toThrow(
		'No transition for symbol "b" from state "p"'
	);

	try {
		p.transitionFor(1);
	} catch (e) {
		expect(e).toBeInstanceOf(AutomatonError);
		expect(e).toMatchObject({
			name: "UndefinedTransitionError",
			state: "p",
			symbol: 1,
		});
	}
});

test("numeric and string symbols are distinct keys", () => {
	const p = new State<string | number>("p");
	const q = new State<string | number>("q");
	p.addTransition(1, p).addTransition("1", q);

	expect(p.transitionFor(1).target).toBe(p);
	expect(p.transitionFor("1").target).toBe(q);
});

test("toString marks initial and accepting states", () => {
	expect(String(new State("p", { initial: true, accepting: true }))).toBe(
		"> State(p) *"
	);
	expect(String(new State("q", { initial: true }))).toBe("> State(q)");
	expect(String(new State("r", { accepting: true }))).toBe("State(r) *");
	expect(String(new State("s"))).toBe("State(s)");
});

test("flags default to false", () => {
	const s = new State<string, number>("s", { output: 7 });
	expect(s.initial).toBe(false);
	expect(s.accepting).toBe(false);
	expect(s.strict).toBe(false);
	expect(s.output).toBe(7);
});

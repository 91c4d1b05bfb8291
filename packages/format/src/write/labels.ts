/**
 * Discovery pass of label-aware writing.
 * Finds the compound nodes that must be written as `#n=` / `#n#`.
 */

import { type Compound, type Datum, isCompound, Pair } from '../core/datum.ts'

/** Compound node to label number, starting at 1. */
export type LabelTable = ReadonlyMap<Compound, number>

/** Children in writing order: car before cdr, vector slots left to right. */
function children(node: Compound): readonly Datum[] {
	return node instanceof Pair ? [node.car, node.cdr] : node
}

function assignLabels(nodes: readonly Compound[]): Map<Compound, number> {
	return new Map(nodes.map((node, index): [Compound, number] => [node, index + 1]))
}

/**
 * Labels every compound node reachable more than once, by identity.
 * Numbers follow the order in which nodes were first seen again.
 */
export function findSharedLabels(root: Datum): Map<Compound, number> {
	const seen = new Set<Compound>()
	const shared: Compound[] = []
	const flagged = new Set<Compound>()
	const stack: Datum[] = [root]

	while (stack.length > 0) {
		const value = stack.pop()
		if (value === undefined || !isCompound(value)) continue
		if (seen.has(value)) {
			if (!flagged.has(value)) {
				flagged.add(value)
				shared.push(value)
			}
			continue
		}
		seen.add(value)
		const next = children(value)
		for (let i = next.length - 1; i >= 0; i--) stack.push(next[i])
	}

	return assignLabels(shared)
}

type Visit = { readonly node: Compound; readonly leaving: boolean }

/**
 * Labels only the nodes that close a cycle, i.e. nodes reached again while
 * still being visited. Every cycle contains at least one of them, so writing
 * with these labels terminates while shared acyclic parts are written out in full.
 */
export function findCycleLabels(root: Datum): Map<Compound, number> {
	const onPath = new Set<Compound>()
	const finished = new Set<Compound>()
	const cyclic: Compound[] = []
	const flagged = new Set<Compound>()
	const stack: Visit[] = []

	const push = (value: Datum): void => {
		if (value !== undefined && isCompound(value)) stack.push({ leaving: false, node: value })
	}

	push(root)
	while (stack.length > 0) {
		const visit = stack.pop()
		if (visit === undefined) break
		const { node, leaving } = visit
		if (leaving) {
			onPath.delete(node)
			finished.add(node)
		} else if (onPath.has(node)) {
			if (!flagged.has(node)) {
				flagged.add(node)
				cyclic.push(node)
			}
		} else if (!finished.has(node)) {
			onPath.add(node)
			stack.push({ leaving: true, node })
			const next = children(node)
			for (let i = next.length - 1; i >= 0; i--) push(next[i])
		}
	}

	return assignLabels(cyclic)
}

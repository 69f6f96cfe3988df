import type { WorkflowBlueprint } from './types'

/**
 * A list of cycles found in the graph. Each cycle is an array of node IDs,
 * starting and ending with the same node.
 */
export type Cycles = string[][]

/**
 * Analysis result for a pipeline blueprint
 */
export interface BlueprintAnalysis {
	cycles: Cycles
	/** Node IDs that have no incoming edges */
	startNodeIds: string[]
	/** Node IDs that have no outgoing edges */
	terminalNodeIds: string[]
	nodeCount: number
	edgeCount: number
	isDag: boolean
	/** True when the nodes form a single chain: one start, one end, no branching */
	isLinear: boolean
	/** The chain order of a linear blueprint; empty otherwise */
	executionOrder: string[]
}

function buildAdjacency(blueprint: WorkflowBlueprint): Map<string, string[]> {
	const adj = new Map<string, string[]>()
	for (const node of blueprint.nodes) {
		adj.set(node.id, [])
	}
	for (const edge of blueprint.edges) {
		adj.get(edge.source)?.push(edge.target)
	}
	return adj
}

/**
 * Detects cycles using an iterative depth-first search.
 * @returns An array of cycles found.
 */
export function checkForCycles(blueprint: WorkflowBlueprint): Cycles {
	const cycles: Cycles = []
	if (blueprint.nodes.length === 0) return cycles

	const adj = buildAdjacency(blueprint)
	// 0 = not visited, 1 = on the current path, 2 = done
	const state = new Map<string, number>(blueprint.nodes.map((node) => [node.id, 0]))

	for (const root of blueprint.nodes) {
		if (state.get(root.id) !== 0) continue

		const path: string[] = []
		const stack: { node: string; next: number }[] = [{ node: root.id, next: 0 }]
		state.set(root.id, 1)
		path.push(root.id)

		while (stack.length > 0) {
			const frame = stack[stack.length - 1]
			const neighbors = adj.get(frame.node) ?? []

			if (frame.next >= neighbors.length) {
				state.set(frame.node, 2)
				stack.pop()
				path.pop()
				continue
			}

			const neighbor = neighbors[frame.next]
			frame.next++

			if (state.get(neighbor) === 1) {
				cycles.push([...path.slice(path.indexOf(neighbor)), neighbor])
			} else if (state.get(neighbor) === 0) {
				state.set(neighbor, 1)
				path.push(neighbor)
				stack.push({ node: neighbor, next: 0 })
			}
		}
	}

	return cycles
}

/**
 * Analyzes a blueprint's structure: cycles, entry and exit points, and whether
 * it is a single chain that can be executed strictly in order.
 */
export function analyzeBlueprint(blueprint: WorkflowBlueprint): BlueprintAnalysis {
	const cycles = checkForCycles(blueprint)
	const nodeIds = blueprint.nodes.map((node) => node.id)
	const incoming = new Map<string, number>(nodeIds.map((id) => [id, 0]))
	const outgoing = new Map<string, number>(nodeIds.map((id) => [id, 0]))

	for (const edge of blueprint.edges) {
		if (incoming.has(edge.target)) incoming.set(edge.target, (incoming.get(edge.target) ?? 0) + 1)
		if (outgoing.has(edge.source)) outgoing.set(edge.source, (outgoing.get(edge.source) ?? 0) + 1)
	}

	const startNodeIds = nodeIds.filter((id) => incoming.get(id) === 0)
	const terminalNodeIds = nodeIds.filter((id) => outgoing.get(id) === 0)

	const executionOrder: string[] = []
	const branchFree = nodeIds.every((id) => (incoming.get(id) ?? 0) <= 1 && (outgoing.get(id) ?? 0) <= 1)
	if (cycles.length === 0 && branchFree && startNodeIds.length === 1) {
		const adj = buildAdjacency(blueprint)
		let current: string | undefined = startNodeIds[0]
		while (current !== undefined) {
			executionOrder.push(current)
			current = adj.get(current)?.[0]
		}
	}
	const isLinear = executionOrder.length > 0 && executionOrder.length === nodeIds.length

	return {
		cycles,
		startNodeIds,
		terminalNodeIds,
		nodeCount: nodeIds.length,
		edgeCount: blueprint.edges.length,
		isDag: cycles.length === 0,
		isLinear,
		executionOrder: isLinear ? executionOrder : [],
	}
}

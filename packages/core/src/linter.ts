import { analyzeBlueprint } from './analysis'
import type { WorkflowBlueprint } from './types'

export type LinterIssueCode =
	| 'INVALID_EDGE_SOURCE'
	| 'INVALID_EDGE_TARGET'
	| 'MISSING_NODE_IMPLEMENTATION'
	| 'ORPHAN_NODE'
	| 'FAN_OUT'
	| 'FAN_IN'
	| 'CYCLE'

export interface LinterIssue {
	code: LinterIssueCode
	message: string
	nodeId?: string
	relatedId?: string
}

export interface LinterResult {
	isValid: boolean
	issues: LinterIssue[]
}

/**
 * Statically checks a blueprint against a registry of implementations. The runtime
 * only executes single chains, so any branching, joining or looping is an issue.
 *
 * @param registry The implementation keys available to the run.
 */
export function lintBlueprint(
	blueprint: WorkflowBlueprint,
	registry: ReadonlyMap<string, unknown> | Record<string, unknown>,
): LinterResult {
	const issues: LinterIssue[] = []
	const nodeIds = new Set(blueprint.nodes.map((n) => n.id))
	const registryKeys = registry instanceof Map ? new Set(registry.keys()) : new Set(Object.keys(registry))

	for (const node of blueprint.nodes) {
		if (!registryKeys.has(node.uses)) {
			issues.push({
				code: 'MISSING_NODE_IMPLEMENTATION',
				message: `Node implementation key '${node.uses}' is not found in the provided registry.`,
				nodeId: node.id,
			})
		}
	}

	const targetsBySource = new Map<string, string[]>()
	const sourcesByTarget = new Map<string, string[]>()
	for (const edge of blueprint.edges) {
		if (!nodeIds.has(edge.source)) {
			issues.push({
				code: 'INVALID_EDGE_SOURCE',
				message: `Edge source '${edge.source}' does not correspond to a valid node ID.`,
				relatedId: edge.target,
			})
		}
		if (!nodeIds.has(edge.target)) {
			issues.push({
				code: 'INVALID_EDGE_TARGET',
				message: `Edge target '${edge.target}' does not correspond to a valid node ID.`,
				relatedId: edge.source,
			})
		}
		targetsBySource.set(edge.source, [...(targetsBySource.get(edge.source) ?? []), edge.target])
		sourcesByTarget.set(edge.target, [...(sourcesByTarget.get(edge.target) ?? []), edge.source])
	}

	for (const [source, targets] of targetsBySource) {
		if (targets.length > 1) {
			issues.push({
				code: 'FAN_OUT',
				message: `Node '${source}' has ${targets.length} successors; a pipeline stage may feed only one.`,
				nodeId: source,
			})
		}
	}
	for (const [target, sources] of sourcesByTarget) {
		if (sources.length > 1) {
			issues.push({
				code: 'FAN_IN',
				message: `Node '${target}' has ${sources.length} predecessors; a pipeline stage may read only one.`,
				nodeId: target,
			})
		}
	}

	const analysis = analyzeBlueprint(blueprint)
	for (const cycle of analysis.cycles) {
		issues.push({
			code: 'CYCLE',
			message: `Cycle detected: ${cycle.join(' -> ')}`,
			nodeId: cycle[0],
		})
	}

	if (blueprint.nodes.length > 1) {
		const reachable = new Set<string>()
		const toVisit = [...analysis.startNodeIds]
		while (toVisit.length > 0) {
			const currentId = toVisit.pop()
			if (currentId === undefined || reachable.has(currentId)) continue
			reachable.add(currentId)
			toVisit.push(...(targetsBySource.get(currentId) ?? []))
		}

		for (const nodeId of nodeIds) {
			if (!reachable.has(nodeId)) {
				issues.push({
					code: 'ORPHAN_NODE',
					message: `Node '${nodeId}' is not reachable from the pipeline's start node.`,
					nodeId,
				})
			}
		}
		if (analysis.startNodeIds.length > 1) {
			for (const nodeId of analysis.startNodeIds.slice(1)) {
				issues.push({
					code: 'ORPHAN_NODE',
					message: `Node '${nodeId}' is a second entry point; only '${analysis.startNodeIds[0]}' may start the pipeline.`,
					nodeId,
				})
			}
		}
	}

	return {
		isValid: issues.length === 0,
		issues,
	}
}

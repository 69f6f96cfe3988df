import { describe, expect, it } from 'vitest'
import { analyzeBlueprint, checkForCycles } from '../src/analysis'
import type { WorkflowBlueprint } from '../src/types'

function blueprintOf(nodeIds: string[], edges: [string, string][]): WorkflowBlueprint {
	return {
		id: 'test',
		nodes: nodeIds.map((id) => ({ id, uses: id })),
		edges: edges.map(([source, target]) => ({ source, target })),
	}
}

describe('Graph Analysis', () => {
	describe('checkForCycles', () => {
		it('should find no cycles in a chain', () => {
			expect(checkForCycles(blueprintOf(['a', 'b', 'c'], [['a', 'b'], ['b', 'c']]))).toEqual([])
		})

		it('should report a cycle as a closed path', () => {
			const cycles = checkForCycles(
				blueprintOf(
					['a', 'b', 'c'],
					[
						['a', 'b'],
						['b', 'c'],
						['c', 'b'],
					],
				),
			)
			expect(cycles).toEqual([['b', 'c', 'b']])
		})

		it('should report a self loop', () => {
			expect(checkForCycles(blueprintOf(['a'], [['a', 'a']]))).toEqual([['a', 'a']])
		})

		it('should handle an empty blueprint', () => {
			expect(checkForCycles(blueprintOf([], []))).toEqual([])
		})
	})

	describe('analyzeBlueprint', () => {
		it('should order a linear blueprint by its edges, not by declaration', () => {
			const analysis = analyzeBlueprint(blueprintOf(['c', 'a', 'b'], [['a', 'b'], ['b', 'c']]))
			expect(analysis.isLinear).toBe(true)
			expect(analysis.isDag).toBe(true)
			expect(analysis.executionOrder).toEqual(['a', 'b', 'c'])
			expect(analysis.startNodeIds).toEqual(['a'])
			expect(analysis.terminalNodeIds).toEqual(['c'])
			expect(analysis.nodeCount).toBe(3)
			expect(analysis.edgeCount).toBe(2)
		})

		it('should treat a single node as linear', () => {
			const analysis = analyzeBlueprint(blueprintOf(['only'], []))
			expect(analysis.isLinear).toBe(true)
			expect(analysis.executionOrder).toEqual(['only'])
		})

		it('should not order a branching blueprint', () => {
			const analysis = analyzeBlueprint(blueprintOf(['a', 'b', 'c'], [['a', 'b'], ['a', 'c']]))
			expect(analysis.isLinear).toBe(false)
			expect(analysis.executionOrder).toEqual([])
			expect(analysis.terminalNodeIds).toEqual(['b', 'c'])
		})

		it('should not order two disconnected chains', () => {
			const analysis = analyzeBlueprint(blueprintOf(['a', 'b', 'c'], [['a', 'b']]))
			expect(analysis.isLinear).toBe(false)
			expect(analysis.startNodeIds).toEqual(['a', 'c'])
		})

		it('should not order a blueprint with a cycle', () => {
			const analysis = analyzeBlueprint(blueprintOf(['a', 'b'], [['a', 'b'], ['b', 'a']]))
			expect(analysis.isDag).toBe(false)
			expect(analysis.isLinear).toBe(false)
			expect(analysis.startNodeIds).toEqual([])
		})
	})
})

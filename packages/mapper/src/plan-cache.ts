import stringify from 'fast-json-stable-stringify';
import type { PlanResolver, ResolveOptions } from './plan-resolver';
import type { ColumnSignature, MappingPlan, TargetType } from './types';

/**
 * Plan Cache
 *
 * Resolved plans keyed by (target type, prefix, column signature). Failed
 * resolutions throw before anything is stored; a stored plan is never replaced.
 */
export class PlanCache {
	private readonly plans = new WeakMap<TargetType, Map<string, MappingPlan>>();

	public constructor(private readonly resolver: PlanResolver) {}

	private static keyOf(columns: ColumnSignature, options: ResolveOptions): string {
		return stringify({ prefix: options.prefix ?? '', requireConverters: options.requireConverters, columns });
	}

	public getOrResolve(type: TargetType, columns: ColumnSignature, options: ResolveOptions = {}): MappingPlan {
		const key = PlanCache.keyOf(columns, options);
		const cached = this.plans.get(type)?.get(key);
		if (cached) {
			return cached;
		}

		const plan = this.resolver.resolve(type, columns, options);

		let shapes = this.plans.get(type);
		if (!shapes) {
			shapes = new Map();
			this.plans.set(type, shapes);
		}
		if (!shapes.has(key)) {
			shapes.set(key, plan);
		}
		return shapes.get(key) ?? plan;
	}

	public has(type: TargetType, columns: ColumnSignature, options: ResolveOptions = {}): boolean {
		return this.plans.get(type)?.has(PlanCache.keyOf(columns, options)) ?? false;
	}
}

/**
 * Runs a compute kernel once per invocation id, grouped into workgroups.
 *
 * A kernel receives its invocation ids and the bindings of the dispatch and
 * must run to completion without waiting on anything. Invocations of one
 * dispatch share no mutable state except the output slots each one owns, so
 * the dispatcher is free to visit them in any order.
 */

// ── Types ───────────────────────────────────────────────────────────

export interface Invocation {
  /** global_invocation_id.x */
  globalId: number;
  /** workgroup_id.x */
  workgroupId: number;
  /** local_invocation_id.x */
  localId: number;
}

export type ComputeKernel<B> = (invocation: Invocation, bindings: B) => void;

export type DispatchOrder = 'forward' | 'reverse';

export interface DispatchOptions {
  workgroupSize: number;
  workgroupCount: number;
  /** Visiting order of workgroups. Kernels must not observe a difference. */
  order?: DispatchOrder;
}

export interface DispatchStats {
  workgroups: number;
  invocations: number;
}

// ── Helpers ─────────────────────────────────────────────────────────

/** Number of workgroups needed to cover `invocations` ids. */
export function workgroupsFor(invocations: number, workgroupSize: number): number {
  return Math.ceil(invocations / workgroupSize);
}

// ── Dispatch ────────────────────────────────────────────────────────

export function dispatchWorkgroups<B>(
  kernel: ComputeKernel<B>,
  bindings: B,
  options: DispatchOptions,
): DispatchStats {
  const { workgroupSize, workgroupCount, order = 'forward' } = options;

  if (!Number.isInteger(workgroupSize) || workgroupSize < 1) {
    throw new RangeError(`workgroupSize must be a positive integer, got ${workgroupSize}`);
  }
  if (!Number.isInteger(workgroupCount) || workgroupCount < 0) {
    throw new RangeError(`workgroupCount must be a non-negative integer, got ${workgroupCount}`);
  }

  for (let n = 0; n < workgroupCount; n++) {
    const workgroupId = order === 'reverse' ? workgroupCount - 1 - n : n;
    for (let localId = 0; localId < workgroupSize; localId++) {
      kernel({ globalId: workgroupId * workgroupSize + localId, workgroupId, localId }, bindings);
    }
  }

  return { workgroups: workgroupCount, invocations: workgroupCount * workgroupSize };
}

/** Dispatch a kernel as a single invocation (workgroup size 1, one group). */
export function dispatchSingle<B>(kernel: ComputeKernel<B>, bindings: B): DispatchStats {
  return dispatchWorkgroups(kernel, bindings, { workgroupSize: 1, workgroupCount: 1 });
}

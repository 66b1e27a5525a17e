import type { BodyNode } from '../cst/nodes';
import { walk } from '../cst/utils';
import type { LintSink } from '../diagnostics';
import { checkRequiredKwargs } from '../parse/args';

// Required-keyword checks over every standard argument tree, in source order.
export function lintListfile(body: BodyNode, lint: LintSink): void {
	for (const node of walk(body)) {
		if (node.kind !== 'ARGGROUP' || node.variant !== 'standard') continue;
		if (node.grammar.required.length) checkRequiredKwargs(node, lint, node.grammar.required);
	}
}

import type { CallArgument, FormulaNode } from '@/types/formulaTypes';



/** Depth-first, left to right (source order). List items are visited as plain nodes. */
export const walkFormula = (node: CallArgument, visit: (n: FormulaNode) => void): void => {
   switch (node.kind) {
      case 'list':
         node.items.forEach((item) => walkFormula(item, visit));
         return;
      case 'number':
      case 'boolean':
      case 'identifier':
         visit(node);
         return;
      case 'unary':
         visit(node);
         walkFormula(node.operand, visit);
         return;
      case 'binary':
         visit(node);
         walkFormula(node.left, visit);
         walkFormula(node.right, visit);
         return;
      case 'comparison':
         visit(node);
         walkFormula(node.left, visit);
         node.links.forEach((link) => walkFormula(link.right, visit));
         return;
      case 'call':
         visit(node);
         node.args.forEach((arg) => walkFormula(arg, visit));
         return;
   }
};

export const containsComparison = (node: FormulaNode): boolean => {
   let found = false;
   walkFormula(node, (n) => {
      if (n.kind === 'comparison') found = true;
   });
   return found;
};

/** Each identifier once, in first-occurrence order. Function callees are not identifiers. */
export const collectIdentifiers = (node: FormulaNode): string[] => {
   const seen = new Set<string>();
   walkFormula(node, (n) => {
      if (n.kind === 'identifier') seen.add(n.name);
   });
   return [...seen];
};

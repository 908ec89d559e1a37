export * from "./nodes";
export { buildTree, TreeBuilder } from "./treeBuilder";
export { ensureTwoTrailingNewlines, htmlToMarkdown, isBlockLevel, renderMarkdown } from "./renderer";
export { buildTableRows, formatTable, normalizeCellContent } from "./table";

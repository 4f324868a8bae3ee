import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';

const SKIPPED_TAGS = new Set(['script', 'style', 'template']);

/** 按文档顺序收集节点下的全部文本节点 */
export function collectStrings(node: AnyNode, strip: boolean, out: string[] = []): string[] {
  if (isText(node)) {
    const value = strip ? node.data.trim() : node.data;
    if (!strip || value) {
      out.push(value);
    }
    return out;
  }
  if (isTag(node) && SKIPPED_TAGS.has(node.name)) {
    return out;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectStrings(child, strip, out);
    }
  }
  return out;
}

/** 去除首尾空白后以单个空格拼接，用于提取链接与容器的可见文本 */
export function visibleText(node: AnyNode): string {
  return collectStrings(node, true).join(' ');
}

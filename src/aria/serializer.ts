import type {
  AriaChild,
  AriaTemplateNode,
  AriaTree,
  SerializedChild,
  SerializedNode,
  SerializedTree,
} from "../types.js";

// Serialized input as it arrives from YAML: `children` may be left out.
export type SerializedNodeInput = Omit<SerializedNode, "children"> & {
  children?: SerializedChildInput[];
};

export type SerializedChildInput = SerializedNodeInput | string;

export function serializeNode(node: AriaTemplateNode): SerializedNode {
  const out: Omit<SerializedNode, "children"> = { role: node.role };
  if (node.name) out.name = { value: node.name.value, is_regex: node.name.isRegex };
  if (node.ref !== undefined) out.ref = node.ref;
  if (node.checked !== undefined) out.checked = node.checked;
  if (node.disabled !== undefined) out.disabled = node.disabled;
  if (node.expanded !== undefined) out.expanded = node.expanded;
  if (node.active !== undefined) out.active = node.active;
  if (node.level !== undefined) out.level = node.level;
  if (node.pressed !== undefined) out.pressed = node.pressed;
  if (node.selected !== undefined) out.selected = node.selected;
  if (Object.keys(node.props).length > 0) out.props = { ...node.props };
  return { ...out, children: node.children.map(serializeChild) };
}

function serializeChild(child: AriaChild): SerializedChild {
  return typeof child === "string" ? child : serializeNode(child);
}

/** Convert a parsed tree to plain data. Absent fields are left out, never nulled. */
export function serializeTree(tree: AriaTree): SerializedTree {
  return tree.map(serializeChild);
}

export function deserializeNode(data: SerializedNodeInput): AriaTemplateNode {
  const node: AriaTemplateNode = {
    kind: "node",
    role: data.role,
    props: { ...data.props },
    children: (data.children ?? []).map(deserializeChild),
  };
  if (data.name) node.name = { value: data.name.value, isRegex: data.name.is_regex };
  if (data.ref !== undefined) node.ref = data.ref;
  if (data.checked !== undefined) node.checked = data.checked;
  if (data.pressed !== undefined) node.pressed = data.pressed;
  if (data.disabled !== undefined) node.disabled = data.disabled;
  if (data.expanded !== undefined) node.expanded = data.expanded;
  if (data.active !== undefined) node.active = data.active;
  if (data.selected !== undefined) node.selected = data.selected;
  if (data.level !== undefined) node.level = data.level;
  return node;
}

function deserializeChild(child: SerializedChildInput): AriaChild {
  return typeof child === "string" ? child : deserializeNode(child);
}

export function deserializeTree(data: SerializedChildInput[]): AriaTree {
  return data.map(deserializeChild);
}

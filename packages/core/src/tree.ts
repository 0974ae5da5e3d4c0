import { InvalidPathError, RouteConflictError } from "./errors";
import type { Handler, Params } from "./types";

/**
 * A node in the route tree. Each node represents one path segment and can have
 * literal children and at most one parameter child.
 */
export class RouteNode {
	/** Map of literal path segments to their child nodes. The empty segment represents a trailing slash. */
	children = new Map<string, RouteNode>();
	/** Parameter child node with its parameter name (e.g. for ":id" segments). The name never changes once set. */
	paramChild?: { name: string; node: RouteNode };
	/** Handler bound to this node when a route ends here */
	handler: Handler | null = null;
}

/**
 * Outcome of walking the tree for a request path.
 *
 * - `node` is the node reached after the last segment, or undefined when the last segment matched nothing.
 * - `previous` is the node the last segment was resolved from.
 * - `deadEnd` is set when a segment before the last one matched nothing.
 */
export interface Walk {
	node?: RouteNode;
	previous?: RouteNode;
	deadEnd: boolean;
}

/**
 * Splits a path on "/" without dropping empty segments.
 *
 * @example
 * ```typescript
 * splitPath("");            // [""]
 * splitPath("/");           // ["", ""]
 * splitPath("/foo/bar//");  // ["", "foo", "bar", "", ""]
 * ```
 */
export function splitPath(path: string): string[] {
	return path.split("/");
}

/**
 * Decodes a captured path parameter, keeping the raw segment when it is not valid percent-encoding.
 */
function decodeParam(segment: string): string {
	try {
		return decodeURIComponent(segment);
	} catch (err) {
		if (err instanceof URIError) return segment;
		throw err;
	}
}

/**
 * Route tree for a single HTTP method.
 *
 * @example
 * ```typescript
 * const tree = new RouteTree();
 * tree.insert("/users/:id", handler);
 *
 * const params: Params = {};
 * const walk = tree.lookup("/users/42", params);
 * // walk.node?.handler === handler, params.id === "42"
 * ```
 */
export class RouteTree {
	readonly root = new RouteNode();

	/**
	 * Inserts a route, creating the nodes its path needs, and binds the handler to the final node.
	 * A later insert of the same path replaces the handler.
	 *
	 * @throws {InvalidPathError} If the path does not start with "/"
	 * @throws {RouteConflictError} If a parameter segment disagrees with the parameter name already bound at that position
	 */
	insert(path: string, handler: Handler | null): void {
		if (path[0] !== "/") {
			throw new InvalidPathError(path);
		}

		let node = this.root;
		for (const segment of splitPath(path.slice(1))) {
			if (segment.length > 1 && segment[0] === ":") {
				const name = segment.slice(1);
				if (!node.paramChild) {
					node.paramChild = { name, node: new RouteNode() };
				} else if (node.paramChild.name !== name) {
					throw new RouteConflictError(path, node.paramChild.name, name);
				}
				node = node.paramChild.node;
				continue;
			}

			let child = node.children.get(segment);
			if (!child) {
				child = new RouteNode();
				node.children.set(segment, child);
			}
			node = child;
		}

		node.handler = handler;
	}

	/**
	 * Walks the tree for a request path, writing captured parameters into `params`.
	 * Literal children win over the parameter child, and an empty segment never binds a parameter.
	 */
	lookup(path: string, params: Params): Walk {
		const segments = splitPath(path[0] === "/" ? path.slice(1) : path);
		let node: RouteNode = this.root;
		let previous: RouteNode | undefined;

		for (let i = 0; i < segments.length; i++) {
			const segment = segments[i] ?? "";
			previous = node;

			// Try static child first (most common case)
			const staticChild = node.children.get(segment);
			if (staticChild) {
				node = staticChild;
				continue;
			}

			if (node.paramChild && segment !== "") {
				params[node.paramChild.name] = decodeParam(segment);
				node = node.paramChild.node;
				continue;
			}

			return { previous, deadEnd: i < segments.length - 1 };
		}

		return { node, previous, deadEnd: false };
	}

	/**
	 * Renders the tree as indented lines, one per node, depth first.
	 * Nodes with a handler are prefixed with "* ".
	 *
	 * @param label - Label for the root line, usually the HTTP method
	 */
	lines(label: string): string[] {
		const out: string[] = [];
		const visit = (node: RouteNode, name: string, depth: number) => {
			out.push(`${node.handler ? "* " : "  "}${"  ".repeat(depth)}${name}`);
			for (const [segment, child] of node.children) {
				visit(child, `/${segment}`, depth + 1);
			}
			if (node.paramChild) {
				visit(node.paramChild.node, `/:${node.paramChild.name}`, depth + 1);
			}
		};
		visit(this.root, label, 0);
		return out;
	}
}

import type { PageContext, Section, SectionId } from "./types";

export const resolveActiveSectionId = (context: PageContext): SectionId | undefined =>
	context.activeSectionId ?? undefined;

const PATH_BASE = "http://section.invalid";

/** Path part of a url or pathname, without query, hash or trailing slash */
export const normalizePath = (value: string): string => {
	let path: string;
	try {
		path = new URL(value, PATH_BASE).pathname;
	} catch {
		path = value.split(/[?#]/)[0] ?? "";
	}
	if (path.length > 1) {
		path = path.replace(/\/+$/, "");
	}
	return path || "/";
};

/** Id of the first section whose url points at the given pathname */
export function resolveActiveSectionFromPath(
	sections: readonly Section[],
	pathname: string,
): SectionId | undefined {
	const current = normalizePath(pathname);
	return sections.find((section) => normalizePath(section.url) === current)?.id;
}

import type { NavigationItem, Section, SectionId } from "./types";

/**
 * Pair each section with its active flag, keeping input order.
 * Duplicate ids matching the active id are all flagged.
 */
export function buildNavigationTree(
	sections: readonly Section[],
	activeSectionId?: SectionId | null,
): NavigationItem[] {
	return sections.map((section) => ({
		section,
		active: activeSectionId != null && section.id === activeSectionId,
	}));
}

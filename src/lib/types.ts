/** Opaque section identifier assigned by the content backend */
export type SectionId = string | number;

/** A navigable, URL-addressable content block exposed by the content backend */
export type Section = Readonly<{
	id: SectionId;
	title: string;
	url: string;
}>;

/** Per-render information about the page being shown */
export interface PageContext {
	activeSectionId?: SectionId | null;
}

export type NavigationItem = Readonly<{
	section: Section;
	active: boolean;
}>;

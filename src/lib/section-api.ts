import { apiFetch } from "./api";
import { SectionSourceError, formatApiError } from "./errors";
import type { Section, SectionId } from "./types";

const isSectionId = (value: unknown): value is SectionId =>
	typeof value === "string" || typeof value === "number";

/** Copy the fields the navigation needs out of a backend record */
export const toSection = (record: unknown, index?: number): Section => {
	const where = index === undefined ? "section" : `section #${index}`;
	if (!record || typeof record !== "object") {
		throw new SectionSourceError(`Malformed ${where}: expected an object`);
	}
	const id = "id" in record ? record.id : undefined;
	const title = "title" in record ? record.title : undefined;
	const url = "url" in record ? record.url : undefined;
	if (!isSectionId(id)) {
		throw new SectionSourceError(`Malformed ${where}: missing id`);
	}
	if (typeof title !== "string" || typeof url !== "string") {
		throw new SectionSourceError(`Malformed ${where}: title and url must be strings`);
	}
	return { id, title, url };
};

export const toSections = (payload: unknown): Section[] => {
	if (!Array.isArray(payload)) {
		throw new SectionSourceError("Malformed section list: expected an array");
	}
	return payload.map((record: unknown, index) => toSection(record, index));
};

/**
 * Section API client for the content backend
 */
export const sectionApi = {
	/** List all navigable sections in backend order */
	async list(): Promise<Section[]> {
		const res = await apiFetch("/sections");
		if (!res.ok) {
			throw new SectionSourceError(
				await formatApiError(res, `Failed to list sections: ${res.statusText}`),
				res.status,
			);
		}
		return toSections(await res.json());
	},

	/** Get a single section by ID */
	async get(id: SectionId): Promise<Section> {
		const res = await apiFetch(`/sections/${encodeURIComponent(String(id))}`);
		if (!res.ok) {
			throw new SectionSourceError(
				await formatApiError(res, `Failed to get section: ${res.statusText}`),
				res.status,
			);
		}
		return toSection(await res.json());
	},
};

export type SectionSource = Pick<typeof sectionApi, "list">;

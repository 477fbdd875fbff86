/** Raised when the content backend cannot supply a usable section list */
export class SectionSourceError extends Error {
	constructor(
		message: string,
		public status?: number,
	) {
		super(message);
		this.name = "SectionSourceError";
	}
}

export const parseErrorDetail = (detail: unknown): string => {
	if (typeof detail === "string" && detail.trim()) return detail;
	if (Array.isArray(detail)) {
		const messages = detail
			.map((item: unknown) => {
				if (typeof item === "string") return item;
				if (item && typeof item === "object") {
					if ("msg" in item && typeof item.msg === "string") return item.msg;
					return JSON.stringify(item);
				}
				return "";
			})
			.filter(Boolean);
		return messages.join("\n");
	}
	if (detail && typeof detail === "object") return JSON.stringify(detail);
	return "";
};

export const formatApiError = async (res: Response, fallback: string): Promise<string> => {
	try {
		const payload: unknown = await res.json();
		const detail =
			payload && typeof payload === "object" && "detail" in payload ? payload.detail : undefined;
		return parseErrorDetail(detail) || fallback;
	} catch {
		return fallback;
	}
};

export const errorMessage = (e: unknown, fallback: string): string =>
	e instanceof Error ? e.message : fallback;

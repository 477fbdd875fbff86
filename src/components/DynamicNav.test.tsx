import { render, screen } from "@solidjs/testing-library";
import { http, HttpResponse } from "msw";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSectionStore } from "~/lib/section-store";
import type { Section } from "~/lib/types";
import { resetMockData, seedSections } from "~/test/mocks/handlers";
import { server } from "~/test/mocks/server";
import { DynamicNav } from "./DynamicNav";

const location = vi.hoisted(() => ({ pathname: "/" }));

vi.mock("@solidjs/router", () => ({
	useLocation: () => location,
}));

const sections: Section[] = [
	{ id: 1, title: "Home", url: "/" },
	{ id: 2, title: "About", url: "/about" },
	{ id: 3, title: "Blog", url: "/blogs/news" },
];

describe("DynamicNav", () => {
	beforeEach(() => {
		resetMockData();
		seedSections(sections);
		location.pathname = "/";
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("loads sections and marks the one matching the route", async () => {
		location.pathname = "/about/";
		render(() => <DynamicNav store={createSectionStore()} />);

		expect(screen.getByText("Loading sections…")).toBeInTheDocument();
		const about = await screen.findByRole("link", { name: "About" });
		expect(about).toHaveClass("ui-nav-link-active");
		expect(screen.getAllByRole("link")).toHaveLength(3);
		expect(screen.getByRole("link", { name: "Home" })).not.toHaveClass("ui-nav-link-active");
	});

	it("prefers the page's own section id over the route", async () => {
		render(() => <DynamicNav store={createSectionStore()} activeSectionId={3} />);

		const blog = await screen.findByRole("link", { name: "Blog" });
		expect(blog).toHaveAttribute("aria-current", "page");
		expect(screen.getByRole("link", { name: "Home" })).not.toHaveAttribute("aria-current");
	});

	it("marks nothing on a route outside the menu", async () => {
		location.pathname = "/cart";
		const { container } = render(() => <DynamicNav store={createSectionStore()} />);

		await screen.findByRole("link", { name: "Home" });
		expect(container.querySelectorAll(".ui-nav-link-active")).toHaveLength(0);
	});

	it("lets two navs share one store and one request", async () => {
		const consoleLog = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const store = createSectionStore();
		render(() => (
			<>
				<DynamicNav store={store} />
				<DynamicNav store={store} />
			</>
		));

		await screen.findAllByRole("link", { name: "Home" });
		expect(screen.getAllByRole("navigation")).toHaveLength(2);
		expect(screen.getAllByRole("link")).toHaveLength(6);
		expect(consoleLog).toHaveBeenCalledTimes(1);
		expect(consoleLog).toHaveBeenCalledWith("apiFetch: /api/sections");
	});

	it("shows an alert when the backend fails", async () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);
		server.use(
			http.get("/api/sections", () => HttpResponse.json({ detail: "down" }, { status: 500 })),
		);
		const store = createSectionStore();
		render(() => <DynamicNav store={store} />);

		expect(await screen.findByRole("alert")).toHaveTextContent("Could not load sections");
		expect(store.error()).toBe("down");
		expect(screen.queryByRole("navigation")).not.toBeInTheDocument();
	});
});

import { describe, expect, test } from "vitest"
import { type ResolverConfigInput, resolveConfig } from "../config"
import { DiagnosticLog } from "../diagnostics"
import type { DependencyEdge } from "../graph/types"
import { silentLogger } from "../logger"
import type { ContainerNode, Snapshot } from "../snapshot/types"
import { composeExtractor, parseDependencyLabel } from "./compose"
import { environmentExtractor, hostTokens } from "./environment"
import { linksExtractor, parseLink } from "./links"
import { networkExtractor } from "./network"
import { ContainerIndex } from "./resolve"
import { type Extractor, MalformedNodeError } from "./types"
import { parseVolumesFrom, volumeExtractor } from "./volume"

function container(id: string, extra: Partial<ContainerNode> = {}): ContainerNode {
	return { id, name: id, environment: {}, mounts: [], networks: {}, ...extra }
}

function run(
	extractor: Extractor,
	snapshot: Partial<Snapshot>,
	config?: ResolverConfigInput,
) {
	const full: Snapshot = { containers: [], composeServices: [], ...snapshot }
	const diagnostics = new DiagnosticLog(silentLogger)
	const edges = extractor.extract(full, {
		config: resolveConfig(config),
		diagnostics,
		index: new ContainerIndex(full),
	})
	return { edges, diagnostics: diagnostics.list() }
}

const pairs = (edges: { from: string; to: string }[]) =>
	edges.map((e) => `${e.from}->${e.to}`)

describe("compose extractor", () => {
	const containers = [
		container("shop-web-1", { composeProject: "shop", composeService: "web" }),
		container("shop-api-1", { composeProject: "shop", composeService: "api" }),
	]

	test("emits one edge per depends_on entry, dependent to dependency", () => {
		const { edges } = run(composeExtractor, {
			containers,
			composeServices: [
				{
					project: "shop",
					name: "web",
					dependsOn: [{ service: "api", condition: "service_healthy" }],
					links: [],
					volumesFrom: [],
				},
			],
		})

		expect(edges).toEqual([
			{
				from: "shop-web-1",
				to: "shop-api-1",
				kind: "compose_depends_on",
				ordering: true,
				evidence: [
					{
						kind: "compose_depends_on",
						via: "compose",
						project: "shop",
						service: "api",
						condition: "service_healthy",
					},
				],
			},
		])
	})

	test("leaves unknown services unresolved for the graph builder", () => {
		const { edges } = run(composeExtractor, {
			containers,
			composeServices: [
				{
					project: "shop",
					name: "web",
					dependsOn: [{ service: "ghost" }],
					links: [],
					volumesFrom: [],
				},
			],
		})

		expect(pairs(edges)).toEqual(["shop-web-1->ghost"])
	})

	test("reads dependency labels in compose form", () => {
		const { edges } = run(composeExtractor, {
			containers: [
				container("worker", {
					labels: {
						"com.docker.compose.depends_on":
							"db:service_started:false,cache:service_healthy:true",
					},
				}),
				container("db"),
				container("cache"),
			],
		})

		const condition = (edge: DependencyEdge) => {
			const evidence = edge.evidence[0]
			return evidence?.kind === "compose_depends_on" ? evidence.condition : undefined
		}

		expect(edges.map((e) => [e.from, e.to, condition(e)])).toEqual([
			["worker", "db", "service_started"],
			["worker", "cache", "service_healthy"],
		])
	})

	test("reads JSON dependency labels", () => {
		const { edges } = run(composeExtractor, {
			containers: [container("worker", { labels: { requires: '["db"]' } }), container("db")],
		})

		expect(pairs(edges)).toEqual(["worker->db"])
		expect(edges[0]?.evidence).toEqual([
			{ kind: "compose_depends_on", via: "label", label: "requires", service: "db" },
		])
	})

	test("skips a container with an unreadable label and records it", () => {
		const { edges, diagnostics } = run(composeExtractor, {
			containers: [
				container("worker", { labels: { depends_on: "[1, 2]" } }),
				container("api", { labels: { depends_on: "db" } }),
				container("db"),
			],
		})

		expect(pairs(edges)).toEqual(["api->db"])
		expect(diagnostics).toHaveLength(1)
		expect(diagnostics[0]).toMatchObject({
			code: "malformed_input",
			source: "compose",
			nodeId: "worker",
		})
	})

	test("parseDependencyLabel splits entries and conditions", () => {
		expect(parseDependencyLabel("db:service_started:false, cache")).toEqual([
			{ service: "db", condition: "service_started" },
			{ service: "cache" },
		])
		expect(parseDependencyLabel('"db"')).toEqual([{ service: "db" }])
	})
})

describe("links extractor", () => {
	test("parseLink understands runtime and compose forms", () => {
		expect(parseLink("/db:/web/database")).toEqual({ target: "db", alias: "database" })
		expect(parseLink("db:database")).toEqual({ target: "db", alias: "database" })
		expect(parseLink("db")).toEqual({ target: "db" })
		expect(() => parseLink("a:b:c")).toThrow(MalformedNodeError)
	})

	test("emits legacy_link edges from container links", () => {
		const { edges } = run(linksExtractor, {
			containers: [container("web", { links: ["/db:/web/db"] }), container("db")],
		})

		expect(edges).toEqual([
			{
				from: "web",
				to: "db",
				kind: "legacy_link",
				ordering: true,
				evidence: [{ kind: "legacy_link", link: "/db:/web/db", alias: "db" }],
			},
		])
	})

	test("resolves compose links within the project", () => {
		const { edges } = run(linksExtractor, {
			containers: [
				container("p-web-1", { composeProject: "p", composeService: "web" }),
				container("p-db-1", { composeProject: "p", composeService: "db" }),
			],
			composeServices: [
				{ project: "p", name: "web", dependsOn: [], links: ["db:database"], volumesFrom: [] },
			],
		})

		expect(pairs(edges)).toEqual(["p-web-1->p-db-1"])
	})

	test("drops every link of a container with one malformed link", () => {
		const { edges, diagnostics } = run(linksExtractor, {
			containers: [container("bad", { links: ["db", ":x"] }), container("db")],
		})

		expect(edges).toEqual([])
		expect(diagnostics.map((d) => [d.code, d.nodeId])).toEqual([["malformed_input", "bad"]])
	})
})

describe("network extractor", () => {
	test("connects every pair on a shared network in both directions", () => {
		const { edges } = run(networkExtractor, {
			containers: [
				container("a", { networks: { app_net: ["a"], bridge: [] } }),
				container("b", { networks: { app_net: [] } }),
				container("c", { networks: { bridge: [] } }),
			],
		})

		expect(pairs(edges)).toEqual(["a->b", "b->a"])
		expect(edges.every((e) => !e.ordering && e.kind === "network_shared")).toBe(true)
		expect(edges[0]?.evidence).toEqual([{ kind: "network_shared", network: "app_net" }])
	})

	test("honours the ignored network list", () => {
		const { edges } = run(
			networkExtractor,
			{
				containers: [
					container("a", { networks: { bridge: [] } }),
					container("b", { networks: { bridge: [] } }),
				],
			},
			{ ignoredNetworks: [] },
		)

		expect(pairs(edges)).toEqual(["a->b", "b->a"])
	})

	test("ignores single-member networks", () => {
		const { edges } = run(networkExtractor, {
			containers: [container("a", { networks: { lonely: [] } }), container("b")],
		})

		expect(edges).toEqual([])
	})
})

describe("volume extractor", () => {
	test("points a read-only consumer at the writer", () => {
		const { edges } = run(volumeExtractor, {
			containers: [
				container("writer", { mounts: [{ volume: "data", path: "/srv/data" }] }),
				container("reader", { mounts: [{ volume: "data", path: "/data", readOnly: true }] }),
			],
		})

		expect(edges).toEqual([
			{
				from: "reader",
				to: "writer",
				kind: "volume_shared",
				ordering: true,
				evidence: [
					{
						kind: "volume_shared",
						volume: "data",
						relation: "reader_writer",
						sourcePath: "/data",
						targetPath: "/srv/data",
					},
				],
			},
		])
	})

	test("links same-mode consumers both ways without ordering", () => {
		const { edges } = run(volumeExtractor, {
			containers: [
				container("a", { mounts: [{ volume: "/host/logs", path: "/logs", type: "bind" }] }),
				container("b", { mounts: [{ volume: "/host/logs", path: "/var/log", type: "bind" }] }),
			],
		})

		expect(pairs(edges)).toEqual(["a->b", "b->a"])
		expect(edges.some((e) => e.ordering)).toBe(false)
	})

	test("turns volumes_from into an ordering edge", () => {
		expect(parseVolumesFrom("db:ro")).toEqual({ kind: "service", name: "db" })
		expect(parseVolumesFrom("container:legacy:rw")).toEqual({ kind: "container", name: "legacy" })

		const { edges } = run(volumeExtractor, {
			containers: [
				container("p-backup-1", { composeProject: "p", composeService: "backup" }),
				container("p-db-1", { composeProject: "p", composeService: "db" }),
			],
			composeServices: [
				{ project: "p", name: "backup", dependsOn: [], links: [], volumesFrom: ["db:ro"] },
			],
		})

		expect(edges).toEqual([
			{
				from: "p-backup-1",
				to: "p-db-1",
				kind: "volume_shared",
				ordering: true,
				evidence: [{ kind: "volume_shared", volume: "db:ro", relation: "volumes_from" }],
			},
		])
	})

	test("skips containers with unreadable mounts", () => {
		const { edges, diagnostics } = run(volumeExtractor, {
			containers: [
				container("broken", { mounts: [{ volume: "", path: "/x" }] }),
				container("a", { mounts: [{ volume: "v", path: "/v" }] }),
			],
		})

		expect(edges).toEqual([])
		expect(diagnostics[0]).toMatchObject({ code: "malformed_input", source: "volume", nodeId: "broken" })
	})
})

describe("environment extractor", () => {
	test("hostTokens keeps dotted names whole", () => {
		expect(hostTokens("postgres://user:pw@db:5432/app")).toEqual([
			"5432",
			"app",
			"db",
			"postgres",
			"pw",
			"user",
		])
		expect(hostTokens("db.internal")).toEqual(["db.internal"])
	})

	test("matches container names inside values", () => {
		const { edges } = run(environmentExtractor, {
			containers: [
				container("api", { environment: { DATABASE_URL: "postgres://db:5432/shop" } }),
				container("db"),
			],
		})

		expect(edges).toEqual([
			{
				from: "api",
				to: "db",
				kind: "env_reference",
				ordering: true,
				evidence: [{ kind: "env_reference", variable: "DATABASE_URL", matched: "db" }],
			},
		])
	})

	test("matches network aliases", () => {
		const { edges } = run(environmentExtractor, {
			containers: [
				container("api", { environment: { DB_HOST: "database" } }),
				container("postgres-1", { networks: { backend: ["database"] } }),
			],
		})

		expect(pairs(edges)).toEqual(["api->postgres-1"])
	})

	test("never matches substrings, other cases or the owner", () => {
		const { edges } = run(environmentExtractor, {
			containers: [
				container("api", {
					environment: { A: "mydb", B: "db.internal", C: "DB", SELF: "api" },
				}),
				container("db"),
			],
		})

		expect(edges).toEqual([])
	})
})

export {
	ComposeParseError,
	composeSnapshot,
	parseDockerCompose,
	withComposeServices,
} from "./docker-compose"
export type { ParsedCompose } from "./docker-compose"

import pino from "pino";
import config from "./Config";

const usePretty = config.get("logPretty");
export const logger = pino({
    name: "jsonapi-hooks",
    level: config.get("logLevel"),
    ...(usePretty && {
        transport: {
            target: "pino-pretty",
            options: {
                colorize: true,
                messageFormat: "[{scope}] => {msg}",
                ignore: "pid,hostname,name,scope"
            }
        }
    })
});

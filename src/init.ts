import "source-map-support/register"
import { configure } from "log4js"
import { logLevel } from "./configs"

export const PROJECT_NAME = "stack-adapter"

export function configureLogging(level: string): void {
    configure({
        appenders: {
            out: { type: "stdout" },
        },
        categories: {
            default: { appenders: ["out"], level },
        },
    })
}

// log4js
configureLogging(logLevel)

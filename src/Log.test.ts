import { after, before, beforeEach, describe, it } from "mocha"
import { expect } from "chai"
import { configure, LoggingEvent } from "log4js"
import { configureLogging } from "./init"
import { Log } from "./Log"
import { logLevel } from "./configs"

describe("Log", () => {
    const recorded: LoggingEvent[] = []
    const recorder = {
        configure: () => (event: LoggingEvent) => {
            recorded.push(event)
        },
    }

    before(() => {
        configure({
            appenders: { memory: { type: recorder } },
            categories: { default: { appenders: ["memory"], level: "debug" } },
        })
    })

    after(() => {
        configureLogging(logLevel)
    })

    beforeEach(() => {
        recorded.length = 0
    })

    it("writes events as JSON at their level", () => {
        const log = Log.getLogger("LogTest")
        log.jdebug({ event: "Created" })
        log.jwarn({ event: "ValidateFailed", params: { size: 2 } })
        log.jerror({ event: "ContractViolation", params: { operation: "pop" } })

        expect(recorded.map((e) => e.level.levelStr)).to.deep.equal(["DEBUG", "WARN", "ERROR"])
        expect(recorded.map((e) => e.categoryName)).to.deep.equal(["LogTest", "LogTest", "LogTest"])
        expect(recorded[1].data).to.deep.equal(['{"event":"ValidateFailed","params":{"size":2}}'])
        expect(recorded[2].data).to.deep.equal(['{"event":"ContractViolation","params":{"operation":"pop"}}'])
    })

    it("reports whether debug is enabled", () => {
        expect(Log.getLogger("LogTest").isDebugEnabled()).to.equal(true)
    })
})

import { getLogger, Logger } from "log4js"

export interface LogEvent {
    event: string
    params?: Record<string, unknown>
}

export class Log {
    static getLogger(category: string): Log {
        return new Log(category)
    }

    private readonly log: Logger

    constructor(readonly category: string) {
        this.log = getLogger(category)
    }

    isDebugEnabled(): boolean {
        return this.log.isDebugEnabled()
    }

    jdebug(obj: LogEvent): void {
        this.log.debug(JSON.stringify(obj))
    }

    jwarn(obj: LogEvent): void {
        this.log.warn(JSON.stringify(obj))
    }

    jerror(obj: LogEvent): void {
        this.log.error(JSON.stringify(obj))
    }
}

import { StackProfile } from "./Constants"

/*********************************************************
 *  ./configs.ts
 *  Process-wide settings, read once when the module loads
 *********************************************************/

export function parseStackProfile(value: string | undefined): StackProfile {
    if (value == null || value.trim() === "") {
        return StackProfile.CHECKED
    }
    const normalized = value.trim().toLowerCase()
    if (normalized === StackProfile.CHECKED) {
        return StackProfile.CHECKED
    } else if (normalized === StackProfile.UNCHECKED) {
        return StackProfile.UNCHECKED
    }
    throw Error(`Unknown STACK_PROFILE "${value}", expected "checked" or "unchecked"`)
}

export const stackProfile: StackProfile = parseStackProfile(process.env.STACK_PROFILE)
export const logLevel: string = process.env.LOG_LEVEL ?? "info"

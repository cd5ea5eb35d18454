import type { AnyToolDefinition } from "../types.js";
import { gatkVersionCheckTool } from "./gatkVersionCheck.js";
import { mutect2CallTool } from "./mutect2Call.js";
import { mutect2PlanTool } from "./mutect2Plan.js";

export const builtinToolDefinitions: AnyToolDefinition[] = [mutect2PlanTool, mutect2CallTool, gatkVersionCheckTool];

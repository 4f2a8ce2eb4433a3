import type { GateAction, Language, SessionContext } from "../types/auth.js";
import { can } from "./accessGate.js";
import { translate } from "./i18n.js";

/** What the client may show about its own session, including the standing disclaimer. */
export function sessionView(context: SessionContext) {
  return {
    role: context.role,
    language: context.language,
    expiresAt: new Date(context.expiresAt).toISOString(),
    permissions: {
      submitBatch: can(context.role, "submit_batch"),
      manageBatch: can(context.role, "manage_batch"),
      browseArchive: can(context.role, "browse_archive")
    },
    disclaimer: translate(context.language, "disclaimer")
  };
}

/** Body of the 403 sent when a role lacks `action`. Archive browsing asks for the reporting password. */
export function accessDeniedBody(action: GateAction, language: Language) {
  return {
    error: "forbidden_role",
    action,
    notices: action === "browse_archive" ? [translate(language, "reporting_only")] : []
  };
}

import type { AuditLogger } from "../../domain/triage/types";

export const logAudit: AuditLogger = (event, fields = {}) => {
    console.log(
        JSON.stringify({
            ts: new Date().toISOString(),
            event,
            ...fields,
        })
    );
};

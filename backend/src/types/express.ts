import type { EditorIdentity } from "../services/requestContext";

declare global {
    namespace Express {
        interface Request {
            editor?: EditorIdentity;
            requestId?: string;
        }
    }
}

export {};

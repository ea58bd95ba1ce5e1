export interface EditorIdentity {
    id: number;
    name: string;
}

/** Per-request state handed explicitly to service operations. */
export interface RequestContext {
    requestId: string;
    editor: EditorIdentity;
}

export const BRAND_NAME = "discbase";
export const BRAND_API_TITLE = `${BRAND_NAME} API`;
export const BRAND_API_DOCS_TITLE = `${BRAND_NAME} API Documentation`;
export const BRAND_API_DESCRIPTION =
    "Music metadata database with moderated release edits and release merging";

import path from "path";
import swaggerJsdoc from "swagger-jsdoc";
import { config } from "../config";
import { BRAND_API_DESCRIPTION, BRAND_API_TITLE } from "./brand";

const artistCreditSchema = {
    type: "array",
    items: {
        type: "object",
        properties: {
            artist: {
                type: "object",
                properties: {
                    id: { type: "integer" },
                    name: { type: "string" },
                },
            },
            name: { type: "string" },
            joinPhrase: { type: "string" },
        },
    },
};

const options: swaggerJsdoc.Options = {
    definition: {
        openapi: "3.0.0",
        info: {
            title: BRAND_API_TITLE,
            version: "1.0.0",
            description: BRAND_API_DESCRIPTION,
        },
        servers: [
            {
                url: `http://localhost:${config.port}`,
                description: "Development server",
            },
        ],
        components: {
            securitySchemes: {
                bearerAuth: {
                    type: "http",
                    scheme: "bearer",
                    bearerFormat: "JWT",
                    description: "Editor token issued by generateToken",
                },
                apiKeyAuth: {
                    type: "apiKey",
                    in: "header",
                    name: "X-API-Key",
                    description: "API key authentication (bots and integrations)",
                },
            },
            schemas: {
                ArtistCredit: artistCreditSchema,
                Release: {
                    type: "object",
                    properties: {
                        id: { type: "integer" },
                        gid: { type: "string", format: "uuid" },
                        name: { type: "string" },
                        comment: { type: "string" },
                        barcode: { type: "string", nullable: true },
                        quality: { type: "integer", enum: [-1, 0, 1, 2] },
                        status: { type: "string", nullable: true },
                        artistCredit: { $ref: "#/components/schemas/ArtistCredit" },
                        combinedFormatName: { type: "string", example: "2×CD" },
                        combinedTrackCount: { type: "string", example: "10 + 12" },
                        mediums: { type: "array", items: { type: "object" } },
                    },
                },
                MediumPosition: {
                    type: "object",
                    properties: {
                        id: { type: "integer" },
                        releaseId: { type: "integer" },
                        oldPosition: { type: "integer" },
                        newPosition: { type: "integer" },
                        oldName: { type: "string" },
                        newName: { type: "string" },
                        trackCount: { type: "integer" },
                        format: { type: "string" },
                    },
                },
                ReleaseMergeForm: {
                    type: "object",
                    properties: {
                        merging: { type: "array", items: { type: "integer" } },
                        target: { type: "integer" },
                        mergeStrategy: { type: "integer", enum: [1, 2] },
                        releases: { type: "array", items: { type: "object" } },
                        mediums: {
                            type: "array",
                            items: { $ref: "#/components/schemas/MediumPosition" },
                        },
                        badRecordingMerges: { type: "array", items: { type: "object" } },
                        recordingMerges: { type: "array", items: { type: "object" } },
                    },
                },
                ReleaseMergeSubmission: {
                    type: "object",
                    required: ["merging", "target", "mergeStrategy"],
                    properties: {
                        merging: {
                            type: "array",
                            items: { type: "integer" },
                            minItems: 2,
                        },
                        target: { type: "integer" },
                        mergeStrategy: {
                            oneOf: [
                                { type: "integer", enum: [1, 2] },
                                { type: "string", enum: ["append", "merge"] },
                            ],
                        },
                        mediumPositions: {
                            type: "array",
                            items: {
                                type: "object",
                                properties: {
                                    id: { type: "integer" },
                                    releaseId: { type: "integer" },
                                    position: { type: "integer" },
                                    name: { type: "string" },
                                },
                            },
                        },
                        editNote: { type: "string" },
                        confirmBadRecordingMerges: { type: "boolean" },
                    },
                },
                Edit: {
                    type: "object",
                    properties: {
                        id: { type: "integer" },
                        type: { type: "integer" },
                        status: { type: "integer" },
                        editorId: { type: "integer" },
                        openTime: { type: "string", format: "date-time" },
                    },
                },
                Error: {
                    type: "object",
                    properties: {
                        error: { type: "string" },
                    },
                },
            },
        },
        security: [{ bearerAuth: [] }, { apiKeyAuth: [] }],
    },
    apis: [path.join(__dirname, "../routes/*.{ts,js}")],
};

export const swaggerSpec = swaggerJsdoc(options);

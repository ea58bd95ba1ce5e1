import { MERGE_STRATEGY } from "@discbase/entity-contract";
import { evaluateMergeFeasibility, type MediumShape } from "../mergeFeasibility";

const mediums: MediumShape[] = [
    { id: 11, releaseId: 1, position: 1, trackCount: 10 },
    { id: 12, releaseId: 1, position: 2, trackCount: 8 },
    { id: 21, releaseId: 2, position: 1, trackCount: 10 },
];

describe("evaluateMergeFeasibility", () => {
    it("rejects an empty source list or a target listed as a source", () => {
        expect(
            evaluateMergeFeasibility(mediums, {
                mergeStrategy: MERGE_STRATEGY.MERGE,
                newId: 1,
                oldIds: [],
            })
        ).toBe(false);
        expect(
            evaluateMergeFeasibility(mediums, {
                mergeStrategy: MERGE_STRATEGY.MERGE,
                newId: 1,
                oldIds: [1, 2],
            })
        ).toBe(false);
    });

    describe("append", () => {
        it("accepts unique positive positions for every medium", () => {
            expect(
                evaluateMergeFeasibility(mediums, {
                    mergeStrategy: MERGE_STRATEGY.APPEND,
                    newId: 1,
                    oldIds: [2],
                    mediumPositions: [
                        { id: 11, position: 1 },
                        { id: 12, position: 2 },
                        { id: 21, position: 3 },
                    ],
                })
            ).toBe(true);
        });

        it("rejects duplicate, missing or non-positive positions", () => {
            const base = {
                mergeStrategy: MERGE_STRATEGY.APPEND,
                newId: 1,
                oldIds: [2],
            };

            expect(
                evaluateMergeFeasibility(mediums, {
                    ...base,
                    mediumPositions: [
                        { id: 11, position: 1 },
                        { id: 12, position: 2 },
                        { id: 21, position: 2 },
                    ],
                })
            ).toBe(false);
            expect(
                evaluateMergeFeasibility(mediums, {
                    ...base,
                    mediumPositions: [
                        { id: 11, position: 1 },
                        { id: 12, position: 2 },
                    ],
                })
            ).toBe(false);
            expect(
                evaluateMergeFeasibility(mediums, {
                    ...base,
                    mediumPositions: [
                        { id: 11, position: 1 },
                        { id: 12, position: 0 },
                        { id: 21, position: 3 },
                    ],
                })
            ).toBe(false);
            expect(evaluateMergeFeasibility(mediums, base)).toBe(false);
        });

        it("rejects a medium placed twice even when the count matches", () => {
            expect(
                evaluateMergeFeasibility(mediums, {
                    mergeStrategy: MERGE_STRATEGY.APPEND,
                    newId: 1,
                    oldIds: [2],
                    mediumPositions: [
                        { id: 11, position: 1 },
                        { id: 11, position: 5 },
                        { id: 21, position: 3 },
                    ],
                })
            ).toBe(false);
        });
    });

    describe("merge", () => {
        it("accepts sources whose mediums line up with the target", () => {
            expect(
                evaluateMergeFeasibility(mediums, {
                    mergeStrategy: MERGE_STRATEGY.MERGE,
                    newId: 1,
                    oldIds: [2],
                })
            ).toBe(true);
        });

        it("rejects a source medium without a matching target medium", () => {
            const mismatched: MediumShape[] = [
                ...mediums,
                { id: 22, releaseId: 2, position: 2, trackCount: 9 },
            ];
            expect(
                evaluateMergeFeasibility(mismatched, {
                    mergeStrategy: MERGE_STRATEGY.MERGE,
                    newId: 1,
                    oldIds: [2],
                })
            ).toBe(false);

            expect(
                evaluateMergeFeasibility(mediums, {
                    mergeStrategy: MERGE_STRATEGY.MERGE,
                    newId: 2,
                    oldIds: [1],
                })
            ).toBe(false);
        });
    });
});

import { randomBytes } from "crypto";
import * as readline from "readline";
import { apiKeys, editors } from "../src/db/schema";
import { db, pool } from "../src/utils/db";

const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
});

function prompt(question: string): Promise<string> {
    return new Promise((resolve) => {
        rl.question(question, (answer) => resolve(answer));
    });
}

async function main() {
    const name = (await prompt("Editor name: ")).trim();

    if (!name) {
        console.error("Editor name required");
        process.exit(1);
    }

    const key = randomBytes(32).toString("hex");

    const editor = await db.transaction(async (tx) => {
        const [created] = await tx
            .insert(editors)
            .values({ name })
            .returning({ id: editors.id, name: editors.name });
        await tx.insert(apiKeys).values({ key, editorId: created.id });
        return created;
    });

    console.log(`\nCreated editor: ${editor.name} (#${editor.id})`);
    console.log(`API key: ${key}`);
    rl.close();
}

main()
    .catch((e) => {
        console.error(e);
        process.exit(1);
    })
    .finally(async () => {
        await pool.end();
    });

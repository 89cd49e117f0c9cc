/**
 * Example 01: Terminal Invoice Chat
 *
 * Collects invoice details over a chat loop, shows a preview once all five
 * fields are known, and creates the invoice on "APPROVE".
 *
 * Commands: "reset" starts over, "usage" prints token/cost totals,
 * "quit" / "exit" / "bye" leave.
 *
 * Setup:
 * 1. Set GEMINI_API_KEY in your .env file
 * 2. Run: npm run chat
 */

import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { loadConfigFromEnv } from "../lib/config";
import { createGateway, formatResponseUsage, formatSessionUsage, setLogLevel } from "../lib/core";
import { ConversationOrchestrator, InMemoryInvoiceRepository, InMemorySessionStore } from "../lib/conversation";
import { renderPreview } from "../lib/invoice";

const EXIT_WORDS = new Set(["quit", "exit", "bye"]);

async function runExample() {
    const config = loadConfigFromEnv();
    // Keep the chat readable; request logs go to the server, not here.
    setLogLevel(config.logLevel === "debug" ? "debug" : "warn");

    const sessions = new InMemorySessionStore();
    const orchestrator = new ConversationOrchestrator({
        gateway: createGateway(config.extraction),
        sessions,
        invoices: new InMemoryInvoiceRepository({ publicBaseUrl: config.server.publicBaseUrl }),
    });
    const session = await sessions.create("cli");

    console.log("🤖 Invoice Assistant");
    console.log("=".repeat(50));
    console.log("Tell me who to invoice, their email, what for, how much, and when it is due.");
    console.log(`Type "quit" to exit.\n`);

    const rl = createInterface({ input, output });

    try {
        while (true) {
            const line = (await rl.question("You: ")).trim();
            if (!line) {
                continue;
            }

            const lowered = line.toLowerCase();
            if (EXIT_WORDS.has(lowered)) {
                console.log("Assistant: Goodbye!");
                break;
            }
            if (lowered === "reset") {
                await orchestrator.resetSession(session.id);
                console.log("Assistant: Starting a new invoice.\n");
                continue;
            }
            if (lowered === "usage") {
                const info = await orchestrator.getSessionInfo(session.id);
                console.log(`\n${formatSessionUsage(info.usage)}\n`);
                continue;
            }

            const turn = await orchestrator.handleTurn({ sessionId: session.id, userInput: line });

            if (turn.action === "ready_for_approval") {
                for (const notice of turn.notices) {
                    console.log(`⚠️  ${notice.message}`);
                }
                console.log(`\n${renderPreview(turn.record)}\n`);
            } else if (turn.action === "invoice_created" && turn.invoice) {
                console.log(`✅ ${turn.message}`);
                console.log(`   📄 Preview: ${turn.invoice.previewUrl}`);
                console.log(`   📥 PDF:     ${turn.invoice.pdfUrl}\n`);
            } else {
                console.log(`Assistant: ${turn.message}\n`);
            }

            if (turn.usage) {
                console.log(`${formatResponseUsage(turn.usage)}\n`);
            }
        }
    } finally {
        rl.close();
    }
}

runExample().catch((err) => {
    console.error("Chat failed:", err);
    process.exit(1);
});

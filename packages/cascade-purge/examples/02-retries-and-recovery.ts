/**
 * Example 02: Retries and Recovery
 *
 * Shows what happens when a child cannot be destroyed:
 * - PermanentRecordError from a hook: recorded and not retried
 * - any other error: retried with backoff until attempts run out
 *
 * Also shows recover(), which picks up work a crash left behind.
 */
import { z } from "zod";

import {
  createStore,
  defineEntity,
  defineRelation,
  defineSchema,
  PermanentRecordError,
  type PurgeTaskMessage,
} from "cascade-purge";
import { createExampleBackend } from "./_helpers";

const Project = defineEntity("Project", {
  schema: z.object({ name: z.string() }),
});

const Invoice = defineEntity("Invoice", {
  schema: z.object({
    number: z.string(),
    paid: z.boolean(),
    projectId: z.string().nullable(),
  }),
});

const billing = defineSchema({
  id: "billing",
  entities: {
    Project: { type: Project },
    Invoice: {
      type: Invoice,
      hooks: {
        beforeDestroy(record) {
          // Unpaid invoices must be settled by hand
          if (!record.paid) {
            throw new PermanentRecordError("Invoice is unpaid", {
              kind: "Invoice",
              id: record.id,
            });
          }
        },
      },
    },
  },
  relations: {
    invoices: defineRelation(Project, Invoice, { foreignKey: "projectId" }),
  },
});

export async function main(): Promise<void> {
  const backend = createExampleBackend();

  // ============================================================
  // Permanent failures
  // ============================================================

  console.log("=== Permanent failures ===\n");

  const store = createStore(billing, backend, {
    config: { maxAttempts: 3, retryBackoffMs: 0 },
  });

  const project = await store.records.Project.create({ name: "Apollo" });
  await store.records.Invoice.create({ number: "INV-1", paid: true, projectId: project.id });
  await store.records.Invoice.create({ number: "INV-2", paid: false, projectId: project.id });

  await store.records.Project.destroy(project.id);
  await store.drain();

  for (const batch of await store.purge.failedBatches()) {
    console.log(`Batch ${batch.id} (${batch.relation}) failed:`);
    for (const failure of batch.errorReport) {
      console.log(`  ${failure.id}: [${failure.code}] ${failure.message}`);
    }
  }
  console.log(`Invoices kept: ${await store.records.Invoice.count()}`);

  await store.close();

  // ============================================================
  // Recovery with an external queue
  // ============================================================

  console.log("\n=== Recovery ===\n");

  const recoveryBackend = createExampleBackend();
  const outbox: PurgeTaskMessage[] = [];
  const worker = createStore(billing, recoveryBackend, {
    // A broker client would publish here; its consumers call runTask
    queue: {
      enqueue: (message) => {
        outbox.push(message);
        return Promise.resolve(`message-${outbox.length}`);
      },
    },
  });

  const archived = await worker.records.Project.create({ name: "Gemini" });
  await worker.records.Invoice.create({ number: "INV-3", paid: true, projectId: archived.id });
  await worker.records.Project.destroy(archived.id);

  // Simulate a consumer that crashed after claiming the task
  const [message] = outbox;
  if (message !== undefined) {
    await recoveryBackend.claimTask(message.schemaId, message.taskId);
  }

  const report = await worker.purge.recover();
  console.log(`Requeued tasks: ${report.requeuedTasks.join(", ")}`);

  for (const taskId of report.requeuedTasks) {
    const outcome = await worker.purge.runTask(taskId);
    console.log(`Task ${taskId}: ${outcome.outcome}, destroyed ${outcome.destroyed}`);
  }
  console.log(`Invoices left: ${await worker.records.Invoice.count()}`);

  console.log("\n=== Retries and recovery example complete ===");

  await worker.close();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}

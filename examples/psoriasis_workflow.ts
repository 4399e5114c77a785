/**
 * @fileoverview Example: Analysing the psoriasis therapy model
 *
 * This example demonstrates how to:
 * 1. Initialize a workbench and load a model descriptor
 * 2. Reason about a goal before any tool has run
 * 3. Steer attention towards the parameters of interest
 * 4. Run the simulate -> verify -> analyze workflow
 * 5. Save the resulting state as a named snapshot
 *
 * The workflow step calls the simulator, verifier and optimizer configured
 * under `tools`; without them installed those tasks fail and the report
 * says so.
 *
 * Run with: npx tsx examples/psoriasis_workflow.ts
 */

import { fileURLToPath } from 'node:url';
import { initializeWorkbench } from '../src/index.js';

async function main(): Promise<void> {
  const modelPath = fileURLToPath(new URL('./psoriasis_model.yaml', import.meta.url));

  console.log('=== Psoriasis Workflow Example ===\n');

  const workbench = await initializeWorkbench({
    config: { logLevel: 'warn', storage: { snapshotDbPath: ':memory:' } },
  });

  try {
    // ==========================================================================
    // LOAD
    // ==========================================================================

    const summary = await workbench.loadModel(modelPath);
    console.log(`1. Loaded ${summary.model}: ${summary.atoms} atoms, ${summary.links} links`);

    // ==========================================================================
    // REASON
    // ==========================================================================

    const prior = workbench.reasonAboutGoal('remission_365');
    console.log('2. Reachability from parameter evidence alone:');
    console.log(`   probability ${prior.reachability.probability.toFixed(3)}, confidence ${prior.reachability.confidence.toFixed(3)}`);
    for (const item of prior.evidence) {
      console.log(`   - ${item.name}: confidence ${item.confidence.toFixed(3)}`);
    }

    // ==========================================================================
    // ATTENTION
    // ==========================================================================

    const stats = workbench.optimizeAttention({ focusAtoms: ['gamma1', 'k1as'] });
    console.log(`3. Attention: ${stats.focusSize} atom(s) in focus`);
    for (const atom of workbench.getTopImportantAtoms(3)) {
      console.log(`   - ${atom.key} sti=${atom.sti.toFixed(1)}`);
    }

    // ==========================================================================
    // WORKFLOW
    // ==========================================================================

    const workflow = await workbench.createAnalysisWorkflow('psoriasis', { paths: 200, includeOptimization: true });
    const report = await workbench.executeWorkflow(workflow.id);
    console.log(`4. Workflow ${report.workflowId}: ${report.status}`);
    for (const [id, task] of Object.entries(report.tasks)) {
      console.log(`   - ${id}: ${task.status}${task.reason ? ` (${task.reason})` : ''}`);
    }

    // ==========================================================================
    // SNAPSHOT
    // ==========================================================================

    const saved = await workbench.saveSnapshot('psoriasis-example');
    console.log(`5. Saved snapshot ${saved.name} (${saved.atoms} atoms, ${saved.tasks} tasks)`);
  } finally {
    await workbench.shutdown();
  }

  console.log('\n=== Example Complete ===');
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});

#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig, type ReportingConfig } from './config.js';
import { AuthError, describeError, NotFoundError } from './errors.js';
import { createLogger } from './logger.js';
import { createServices } from './services.js';
import { selectPlan } from './testPlanApi.js';

// Load environment variables
dotenv.config();

async function validateConfiguration() {
  console.log('🔍 Validating Azure DevOps configuration...\n');

  let config: ReportingConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    console.log('   Required: ADO_ORG, ADO_PROJECT, ADO_PAT');
    console.log('   Optional: TEST_PLAN_NAME, OUTPUT_DIR, AREA_PATH, ITERATION_PATH, START_DATE, END_DATE\n');
    process.exit(1);
  }

  console.log('✅ Environment variables configured');
  console.log(`   Organization: ${config.orgUrl}`);
  console.log(`   Project: ${config.project}`);
  console.log(`   PAT: ${config.pat.substring(0, 4)}...`);
  console.log(`   Test plan: ${config.planName ?? 'Not set'}`);

  console.log('\n🔗 Testing Azure DevOps connection...\n');
  const { testPlans } = createServices(config, { logger: (component) => createLogger(component, 'error') });

  try {
    const plans = await testPlans.listPlans();
    console.log(`   ✅ Connected! Found ${plans.length} test plan(s):`);
    plans.slice(0, 5).forEach((plan) => {
      console.log(`      - ${plan.name} (${plan.id})`);
    });
    if (plans.length > 5) {
      console.log(`      ... and ${plans.length - 5} more`);
    }

    if (config.planName) {
      try {
        const plan = selectPlan(plans, config.planName);
        console.log(`\n   ✅ Test plan '${config.planName}' resolves to '${plan.name}' (${plan.id})`);
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
        console.log(`\n   ⚠️  Test plan '${config.planName}' not found in project '${config.project}'`);
      }
    }

    console.log('\n✅ Configuration validation successful!');
  } catch (error) {
    console.error(`\n❌ Connection failed:\n${describeError(error)}`);
    if (error instanceof AuthError) {
      console.log('\n   This is an authentication error. Please check:');
      console.log('   1. Your PAT is valid and not expired');
      console.log('   2. Your PAT has Test Management (Read) and Work Items (Read) scopes');
      console.log('   3. The organization is correct');
    }
    process.exit(1);
  }
}

validateConfiguration().catch(error => {
  console.error('Unexpected error:', error);
  process.exit(1);
});

import type { ReleaseConfig } from '../../config/types';
import { DEFAULT_TIMEOUTS } from '../../config/configManager';
import type { ReleaseSummary } from '../../types';
import { createPlatform } from '../../services';
import { formatPlan, listFunctionProblems, plannedStages } from '../plan';
import { formatSummary, toOverrides } from '../release';

const config: ReleaseConfig = {
    platform: { name: 'gcp', registryHost: 'gcr.io' },
    credentialsFile: '/secrets/key.json',
    target: {
        projectId: 'demo-project',
        region: 'us-central1',
        serviceName: 'financial-api',
        resources: { memoryMb: 2048, cpu: 2 },
        scaling: { minInstances: 2, maxInstances: 100 },
        allowPublicAccess: false,
        containerPort: 8080
    },
    build: { contextDir: '/work/app', dockerfile: '/work/app/Dockerfile', buildArgs: {} },
    functions: [
        {
            name: 'risk_analyzer',
            runtime: 'python39',
            entryPoint: 'analyze',
            memoryMb: 256,
            timeoutSeconds: 60,
            trigger: { type: 'topic', topic: 'risk-events' },
            source: '/work/functions/risk_analyzer',
            environment: {}
        },
        {
            name: 'data_processor',
            runtime: 'python39',
            entryPoint: 'process',
            memoryMb: 512,
            timeoutSeconds: 60,
            trigger: { type: 'http' },
            source: '/work/functions/data_processor',
            environment: {}
        }
    ],
    pipeline: {
        strictFunctions: false,
        functionConcurrency: 4,
        retryDelayMs: 2000,
        timeouts: DEFAULT_TIMEOUTS,
        healthCheck: { enabled: true, path: '/health', timeoutMs: 5000, intervalMs: 1000 }
    }
};

describe('release command', () => {
    it('only overrides settings given as flags', () => {
        expect(toOverrides({})).toEqual({
            platform: undefined,
            tag: undefined,
            allowPublicAccess: undefined,
            healthCheckEnabled: undefined,
            strictFunctions: undefined,
            functionConcurrency: undefined
        });
        expect(toOverrides({ allowPublic: true, skipVerify: true, concurrency: '2', tag: 'v1.4.0' })).toEqual({
            platform: undefined,
            tag: 'v1.4.0',
            allowPublicAccess: true,
            healthCheckEnabled: false,
            strictFunctions: undefined,
            functionConcurrency: '2'
        });
    });

    it('prints the URL, the tag and every function status', () => {
        const summary: ReleaseSummary = {
            platform: 'gcp',
            projectId: 'demo-project',
            region: 'us-central1',
            serviceName: 'financial-api',
            serviceUrl: 'https://financial-api-abc123-uc.a.run.app',
            revision: 'financial-api-00007-xyz',
            artifact: {
                repository: 'gcr.io/demo-project/financial-api',
                tag: '20261018-093000000-3f2c1ab',
                imageReference: 'gcr.io/demo-project/financial-api:20261018-093000000-3f2c1ab',
                aliasReference: 'gcr.io/demo-project/financial-api:latest',
                revision: '3f2c1ab',
                builtAt: '2026-10-18T09:30:00.000Z'
            },
            publicAccess: false,
            functions: [
                { name: 'data_processor', status: 'deployed', url: 'https://fn.example.com/data_processor' },
                { name: 'report_generator', status: 'failed', error: 'quota exceeded' }
            ],
            verified: true,
            healthCheck: { url: 'https://financial-api-abc123-uc.a.run.app/health', status: 200, attempts: 2, elapsedMs: 1200 },
            startedAt: '2026-10-18T09:30:00.000Z',
            finishedAt: '2026-10-18T09:35:00.000Z',
            durationMs: 300_000
        };

        expect(formatSummary(summary)).toEqual([
            'Service:   financial-api (gcp:demo-project/us-central1)',
            'URL:       https://financial-api-abc123-uc.a.run.app',
            'Revision:  financial-api-00007-xyz',
            'Image:     gcr.io/demo-project/financial-api:20261018-093000000-3f2c1ab',
            'Tag:       20261018-093000000-3f2c1ab',
            'Access:    restricted',
            'Verified:  yes (HTTP 200)',
            'Functions:',
            '  ✓ data_processor - https://fn.example.com/data_processor',
            '  ✗ report_generator - quota exceeded',
            'Duration:  5m 0s'
        ]);
    });
});

describe('plan command', () => {
    it('lists the stages a release would run', () => {
        expect(plannedStages(config)).toEqual(['authenticate', 'build', 'publish', 'deploy', 'functions', 'verify']);
        expect(
            plannedStages({
                ...config,
                functions: [],
                pipeline: { ...config.pipeline, healthCheck: { ...config.pipeline.healthCheck, enabled: false } }
            })
        ).toEqual(['authenticate', 'build', 'publish', 'deploy']);
    });

    it('describes the target, the image and the functions', () => {
        expect(formatPlan(config, 'gcr.io/demo-project/financial-api')).toEqual([
            'Platform:  gcp',
            'Target:    demo-project/us-central1/financial-api',
            'Image:     gcr.io/demo-project/financial-api:<generated> (alias :latest)',
            'Build:     /work/app/Dockerfile in /work/app',
            'Resources: 2048Mi memory, 2 cpu',
            'Scaling:   2-100 instances',
            'Access:    restricted',
            'Functions (up to 4 at a time):',
            '  • data_processor (python39, http trigger)',
            '  • risk_analyzer (python39, topic trigger)',
            'Health:    /health within 5.0s',
            'Stages:',
            '  1. Authenticate',
            '  2. Build image',
            '  3. Publish image',
            '  4. Deploy service',
            '  5. Deploy functions',
            '  6. Verify deployment'
        ]);
    });

    it('warns about generic and platform function problems', () => {
        const withBadFunction: ReleaseConfig = {
            ...config,
            functions: [config.functions[0], { ...config.functions[1], memoryMb: 0 }]
        };

        expect(listFunctionProblems(withBadFunction, createPlatform(withBadFunction))).toEqual([
            'function data_processor: memory must be positive (got 0)',
            'function data_processor: memory must be one of 128, 256, 512, 1024, 2048, 4096, 8192 MB (got 0)'
        ]);
        expect(listFunctionProblems(config, createPlatform(config))).toEqual([]);
    });
});

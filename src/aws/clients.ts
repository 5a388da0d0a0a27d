import { STSClient } from '@aws-sdk/client-sts';
import { ECRClient } from '@aws-sdk/client-ecr';
import { AppRunnerClient } from '@aws-sdk/client-apprunner';
import { LambdaClient } from '@aws-sdk/client-lambda';
import type { AwsAccessKey } from '../utils/credentials';

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export function toAwsCredentials(key: AwsAccessKey): AwsCredentials {
  return {
    accessKeyId: key.accessKeyId,
    secretAccessKey: key.secretAccessKey,
    ...(key.sessionToken ? { sessionToken: key.sessionToken } : {}),
  };
}

export function createSTSClient(region: string, credentials: AwsCredentials) {
  return new STSClient({ region, credentials });
}

export function createECRClient(region: string, credentials: AwsCredentials) {
  return new ECRClient({ region, credentials });
}

export function createAppRunnerClient(region: string, credentials: AwsCredentials) {
  return new AppRunnerClient({ region, credentials });
}

export function createLambdaClient(region: string, credentials: AwsCredentials) {
  return new LambdaClient({ region, credentials });
}

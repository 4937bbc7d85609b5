export {
  IamAuthenticator,
  iamUrlForInstance,
  IAM_URL,
  IAM_TEST_URL,
  IAM_APIKEY_GRANT_TYPE,
} from './iam-authenticator.js';
export type { TokenProvider, IamAuthenticatorOptions } from './iam-authenticator.js';

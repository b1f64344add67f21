// public api for @leadforge/sdk
// usage:
//   import { defineStages } from '@leadforge/sdk';
//   const stages = defineStages({ mine, validate, synthesize });

export type {
    Lead,
    LeadValue,
    Provider,
    StageContext,
    StageName,
    StageOutput,
    Stages,
    StageWorkspace,
} from './types';
export { defineStages, companyOf, STAGE_NAMES } from './stages';
export { serialize, deserialize, SerializationError, MAX_PAYLOAD_SIZE } from './utils/serialization';

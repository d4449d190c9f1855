export {
  parseSampleMetadata,
  measurementDistribution,
  SampleMetadataRecord,
  DensityRecord,
  ShearRecord,
  type TSampleMetadataRecord,
  type SampleProperties,
} from "./SampleMetadata";

export {
  propagateElasticModuli,
  sampleElasticModuli,
  evaluateElasticFormulas,
  summarizeSamples,
  requireDistribution,
  transitTimeFromStatistics,
  type PropagationConfig,
} from "./ElasticPropagator";
export {
  SampledQuantity,
  ScalarSampler,
  type Operand,
  type SamplingScheme,
} from "./SampledQuantity";
export {
  mulberry32,
  standardNormal,
  inverseNormalCdf,
  latinHypercubeNormals,
  type Rng,
} from "./random";

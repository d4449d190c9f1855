export {
  waveformFromColumns,
  waveformFromRows,
  WaveformColumns,
  WaveformRows,
  type TWaveformColumns,
  type WaveformAdapterConfig,
} from "./WaveformAdapter";

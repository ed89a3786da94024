import { formatIO, type FormatBackend } from '../backends/format/format-io';
import { receiverIO, type ReceiverBackend } from '../backends/receiver/receiver-io';

/**
 * The two engines plugin stages delegate data movement to.
 */
export type IOBackends = {
  format: FormatBackend;
  receiver: ReceiverBackend;
};

export const defaultBackends: IOBackends = {
  format: formatIO,
  receiver: receiverIO,
};

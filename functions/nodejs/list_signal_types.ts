// Lambda handler listing the signal kinds and priority levels a form can offer.
//
// Endpoint: GET /api/types
// Returns:
//   200 { signalTypes: [{ value, label }], priorities: [{ value, label }] }
//   Priorities without a badge label (normal) use their id as label.
import { PRIORITY_LABELS, SIGNAL_KIND_STYLES } from "@src/signals/catalog";
import { PRIORITY_LEVELS, SIGNAL_KINDS } from "@src/signals/types/domain";
import { response } from "./lib/http";

export const handler = async () => {
  return response(200, {
    signalTypes: SIGNAL_KINDS.map(kind => ({
      value: kind,
      label: SIGNAL_KIND_STYLES[kind].displayName,
    })),
    priorities: PRIORITY_LEVELS.map(level => ({
      value: level,
      label: PRIORITY_LABELS[level] || level,
    })),
  });
};

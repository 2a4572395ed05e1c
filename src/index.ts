// Canvas-based agenda component
export { AgendaView, type AgendaProps, type AgendaInput } from './AgendaView';

// Canvas utilities (for advanced usage)
export * from './canvas';

// Helpers
export { AgendaUpdate, diffAgendaProps } from './utils/updateDiff';
export { formatDate, formatTimeRange, getLanguageCode } from './utils/dateFormat';
export { resolveLocalizations, SUPPORTED_LANGUAGES } from './utils/localization';
export { isSpannedAppointment, sortAppointments, resolveItemHeights } from './utils/layoutHelpers';
export { validateAppointment, validateAppointments, validateProps } from './utils/validators';

// Shared types
export * from './types';
export type { Result } from './types/internal';

import { formatOutcome } from '../../core/status';
import type { PassReport } from '../../core/types';
import { outcomeIcon } from './icons';

export function formatReport(report: PassReport): string {
    return `${outcomeIcon(report.outcome.status)} ${formatOutcome(report.project.name, report.outcome)}`;
}

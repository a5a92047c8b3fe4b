/**
 * Audit Socket Handlers
 * Real-time WebSocket event handlers for audit runs
 */

import { Socket } from 'socket.io';
import { auditService, AuditService } from './audit.service';
import { auditRoom } from '../../lib/socket';
import { AuditSocketEvent } from './audit.types';

/**
 * Register audit socket event handlers
 */
export const registerAuditSocketHandlers = (socket: Socket, service: AuditService = auditService): void => {
  /**
   * Join an audit room for real-time updates
   */
  socket.on(AuditSocketEvent.JOIN, (auditId: string) => {
    void socket.join(auditRoom(auditId));
    console.log(`Socket ${socket.id} joined audit room: ${auditId}`);
  });

  /**
   * Leave an audit room
   */
  socket.on(AuditSocketEvent.LEAVE, (auditId: string) => {
    void socket.leave(auditRoom(auditId));
    console.log(`Socket ${socket.id} left audit room: ${auditId}`);
  });

  /**
   * Request current audit status
   */
  socket.on(AuditSocketEvent.STATUS, async (auditId: string) => {
    try {
      const audit = await service.getAudit(auditId);

      if (audit) {
        socket.emit(AuditSocketEvent.STATUS_RESPONSE, {
          success: true,
          audit: { ...audit, report: null },
        });
      } else {
        socket.emit(AuditSocketEvent.STATUS_RESPONSE, {
          success: false,
          error: 'Audit not found',
        });
      }
    } catch (error) {
      socket.emit(AuditSocketEvent.STATUS_RESPONSE, {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });
};

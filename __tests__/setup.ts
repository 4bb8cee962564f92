/**
 * Setup global de Jest: silencia los transports de electron-log para que los tests
 * no escriban archivos de log ni ensucien la salida.
 */
import log from 'electron-log/node';

log.transports.file.level = false;
log.transports.console.level = false;

// טעינת .env כתופעת לוואי של ה-import. חייב להיות ה-import הראשון של נקודת הכניסה
import { loadEnvironment } from './envLoader';

loadEnvironment();

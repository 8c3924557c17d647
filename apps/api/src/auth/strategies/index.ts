export { JwtStrategy } from './jwt.strategy';

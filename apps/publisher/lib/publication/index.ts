export { interpolateEnvVars, loadPublicationFile, parsePublicationYaml } from './loader'
